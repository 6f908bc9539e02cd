import { describe, it, expect, afterEach, vi } from 'vitest';
import { SessionStore } from '../qa/session-store.js';

const START = new Date('2026-05-04T12:00:00.000Z');

describe('SessionStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates distinct empty sessions', () => {
    const store = new SessionStore();
    const ids = new Set(Array.from({ length: 50 }, () => store.createSession()));
    expect(ids.size).toBe(50);

    const [first] = ids;
    const session = first ? store.getSession(first) : null;
    expect(session?.messages).toEqual([]);
    expect(session?.awaitingClarification).toBe(false);
    expect(session?.originalQuestion).toBeUndefined();
  });

  it('returns null and false for unknown ids', () => {
    const store = new SessionStore();
    expect(store.getSession('missing')).toBeNull();
    expect(store.addMessage('missing', 'user', 'hi')).toBe(false);
    expect(store.setAwaitingClarification('missing', 'q', { reason: 'unclear_question' })).toBe(false);
    expect(store.clearClarificationState('missing')).toBe(false);
  });

  it('appends messages in order with metadata', () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    const store = new SessionStore();
    const id = store.createSession();

    store.addMessage(id, 'user', 'Where did they work?');
    store.addMessage(id, 'assistant', '✓ At two startups.', { function_called: 'answer_resume_question' });

    const messages = store.getSession(id)?.messages ?? [];
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Where did they work?'],
      ['assistant', '✓ At two startups.'],
    ]);
    expect(messages[1]?.metadata).toEqual({ function_called: 'answer_resume_question' });
    expect(messages[0]?.timestamp).toBe(START.getTime());
  });

  it('hands out snapshots that do not alias the stored history', () => {
    const store = new SessionStore();
    const id = store.createSession();
    const before = store.getSession(id);
    store.addMessage(id, 'user', 'later');
    expect(before?.messages).toEqual([]);
    expect(store.getSession(id)?.messages).toHaveLength(1);
  });

  it('keeps awaiting flag and original question in step', () => {
    const store = new SessionStore();
    const id = store.createSession();

    store.setAwaitingClarification(id, 'What about cloud?', {
      reason: 'unclear_question',
      clarificationRequest: 'Which provider?',
    });
    const waiting = store.getSession(id);
    expect(waiting?.awaitingClarification).toBe(true);
    expect(waiting?.originalQuestion).toBe('What about cloud?');
    expect(waiting?.clarificationContext).toEqual({
      reason: 'unclear_question',
      clarificationRequest: 'Which provider?',
    });

    store.clearClarificationState(id);
    const cleared = store.getSession(id);
    expect(cleared?.awaitingClarification).toBe(false);
    expect(cleared?.originalQuestion).toBeUndefined();
    expect(cleared?.clarificationContext).toBeUndefined();
  });

  it('expires idle sessions lazily and refreshes lastAccessed on use', () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    const store = new SessionStore({ timeoutMs: 1_000 });
    const id = store.createSession();

    vi.setSystemTime(START.getTime() + 800);
    expect(store.addMessage(id, 'user', 'still here')).toBe(true);

    vi.setSystemTime(START.getTime() + 1_800);
    expect(store.getSession(id)?.lastAccessed).toBe(START.getTime() + 1_800);

    vi.setSystemTime(START.getTime() + 2_801);
    expect(store.getSession(id)).toBeNull();
    expect(store.getStats().active_sessions).toBe(0);
  });

  it('keeps a session accessed exactly at the timeout boundary', () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    const store = new SessionStore({ timeoutMs: 1_000 });
    const id = store.createSession();

    vi.setSystemTime(START.getTime() + 1_000);
    expect(store.getSession(id)).not.toBeNull();
  });

  it('sweeps only expired sessions', () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    const store = new SessionStore({ timeoutMs: 1_000 });
    store.createSession();
    store.createSession();

    vi.setSystemTime(START.getTime() + 1_500);
    const fresh = store.createSession();

    expect(store.cleanupExpiredSessions()).toBe(2);
    expect(store.getSession(fresh)).not.toBeNull();
    expect(store.getStats().active_sessions).toBe(1);
  });

  it('runs the sweep on an interval until stopped', () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    const store = new SessionStore({ timeoutMs: 1_000 });
    store.createSession();

    store.startSweep(500);
    expect(store.getStats().sweep_running).toBe(true);

    vi.advanceTimersByTime(1_500);
    expect(store.getStats().active_sessions).toBe(0);

    store.stopSweep();
    expect(store.getStats().sweep_running).toBe(false);
  });

  it('ignores a non-positive sweep interval', () => {
    const store = new SessionStore();
    store.startSweep(0);
    expect(store.getStats().sweep_running).toBe(false);
  });
});
