import { randomUUID } from 'node:crypto';
import logger from '../lib/logger.js';

export type MessageRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: number;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface ClarificationContext {
  reason: string;
  clarificationRequest?: string;
}

/** Read-only view handed out by the store; mutate through store methods. */
export interface ConversationSession {
  readonly id: string;
  readonly messages: readonly ConversationMessage[];
  readonly createdAt: number;
  readonly lastAccessed: number;
  readonly awaitingClarification: boolean;
  readonly originalQuestion?: string;
  readonly clarificationContext?: Readonly<ClarificationContext>;
}

interface PendingClarification {
  originalQuestion: string;
  context: ClarificationContext;
}

// A single nullable field keeps "awaiting" and "original question" in lockstep.
interface SessionRecord {
  id: string;
  messages: ConversationMessage[];
  createdAt: number;
  lastAccessed: number;
  pending: PendingClarification | null;
}

export interface SessionStoreOptions {
  /** Idle time after which a session is evicted. */
  timeoutMs?: number;
}

export const DEFAULT_SESSION_TIMEOUT_MS = 60 * 60 * 1000;

/**
 * In-memory conversation sessions with idle expiry.
 *
 * Every operation is synchronous, so each one runs to completion on the event
 * loop before any other request can observe the store. Nothing here awaits,
 * which keeps model calls outside the critical section.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly timeoutMs: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
  }

  createSession(): string {
    let id = randomUUID();
    while (this.sessions.has(id)) {
      id = randomUUID();
    }
    const now = Date.now();
    this.sessions.set(id, { id, messages: [], createdAt: now, lastAccessed: now, pending: null });
    return id;
  }

  /** Returns a snapshot, or null when the id is unknown or has expired. */
  getSession(sessionId: string): ConversationSession | null {
    const record = this.touch(sessionId);
    return record ? toSnapshot(record) : null;
  }

  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    metadata?: Record<string, unknown>,
  ): boolean {
    const record = this.touch(sessionId);
    if (!record) return false;
    record.messages.push(Object.freeze({
      role,
      content,
      timestamp: Date.now(),
      metadata: Object.freeze({ ...metadata }),
    }));
    return true;
  }

  setAwaitingClarification(
    sessionId: string,
    originalQuestion: string,
    context: ClarificationContext,
  ): boolean {
    const record = this.touch(sessionId);
    if (!record) return false;
    record.pending = { originalQuestion, context: { ...context } };
    return true;
  }

  clearClarificationState(sessionId: string): boolean {
    const record = this.touch(sessionId);
    if (!record) return false;
    record.pending = null;
    return true;
  }

  /** Evicts every idle session. Returns how many were removed. */
  cleanupExpiredSessions(): number {
    const now = Date.now();
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (this.isExpired(record, now)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      logger.debug({ removed, remaining: this.sessions.size }, 'Expired sessions swept');
    }
    return removed;
  }

  startSweep(intervalMs: number): void {
    if (this.sweepTimer || intervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.cleanupExpiredSessions();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  getStats() {
    return {
      active_sessions: this.sessions.size,
      timeout_ms: this.timeoutMs,
      sweep_running: this.sweepTimer !== null,
    };
  }

  private isExpired(record: SessionRecord, now: number): boolean {
    return now - record.lastAccessed > this.timeoutMs;
  }

  /** Lookup with lazy expiry; refreshes lastAccessed on a hit. */
  private touch(sessionId: string): SessionRecord | null {
    const record = this.sessions.get(sessionId);
    if (!record) return null;
    const now = Date.now();
    if (this.isExpired(record, now)) {
      this.sessions.delete(sessionId);
      return null;
    }
    record.lastAccessed = now;
    return record;
  }
}

function toSnapshot(record: SessionRecord): ConversationSession {
  return {
    id: record.id,
    messages: [...record.messages],
    createdAt: record.createdAt,
    lastAccessed: record.lastAccessed,
    awaitingClarification: record.pending !== null,
    originalQuestion: record.pending?.originalQuestion,
    clarificationContext: record.pending ? { ...record.pending.context } : undefined,
  };
}
