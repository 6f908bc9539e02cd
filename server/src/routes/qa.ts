import { Hono } from 'hono';
import { stream } from 'hono/streaming';
import { z } from 'zod';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { detectInjection } from '../qa/injection-detector.js';
import type { DialogueOrchestrator } from '../qa/orchestrator.js';
import { MAX_QUESTION_LENGTH } from '../qa/sanitize.js';
import type { SessionStore } from '../qa/session-store.js';

const MAX_ASK_BODY_BYTES = 16_000;

export const UNSAFE_QUESTION_MESSAGE =
  'Your question contains potentially unsafe content. Please rephrase your question about the resume.';

const askSchema = z.object({
  question: z.string({ required_error: 'No question provided.', invalid_type_error: 'Question must be a string' })
    .transform((v) => v.trim())
    .refine((v) => v.length > 0, 'Question cannot be empty')
    // Counted in code points, the same unit the sanitizer truncates by.
    .refine((v) => Array.from(v).length <= MAX_QUESTION_LENGTH, `Question too long (max ${MAX_QUESTION_LENGTH} characters)`),
  session_id: z.string().nullish(),
});

// Visible ASCII only; anything else cannot travel back in a header.
const HEADER_SAFE = /^[\x21-\x7e]*$/;

export interface QaRouteDeps {
  store: SessionStore;
  orchestrator: DialogueOrchestrator;
  rateLimit?: { maxRequests: number; windowMs: number };
}

export function createQaRoutes(deps: QaRouteDeps) {
  const qa = new Hono();
  const limit = deps.rateLimit ?? { maxRequests: 30, windowMs: 60_000 };

  qa.post('/create-session', rateLimitMiddleware(limit.maxRequests, limit.windowMs), (c) => {
    const sessionId = deps.store.createSession();
    c.get('log').info({ sessionId }, 'Conversation session created');
    return c.json({ session_id: sessionId });
  });

  qa.post('/ask', rateLimitMiddleware(limit.maxRequests, limit.windowMs), async (c) => {
    const log = c.get('log');
    const body = await parseJsonBodyWithLimit(c, MAX_ASK_BODY_BYTES);
    if (!body.ok) return body.response;

    const parsed = validateBody(askSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: parsed.issues[0]?.message ?? 'Invalid request' }, 400);
    }

    const { question, session_id: sessionId } = parsed.data;
    log.info({ question: question.slice(0, 100) }, 'Received question');

    const verdict = detectInjection(question);
    if (!verdict.isSafe) {
      log.warn(
        { riskScore: verdict.riskScore, patterns: verdict.detectedPatterns, hardVeto: verdict.hardVeto },
        'Blocked potentially unsafe question',
      );
      return c.json({ error: UNSAFE_QUESTION_MESSAGE }, 400);
    }

    c.header('Content-Type', 'text/plain; charset=utf-8');
    c.header('X-Session-ID', sessionId && HEADER_SAFE.test(sessionId) ? sessionId : '');
    return stream(c, async (s) => {
      const abort = new AbortController();
      s.onAbort(() => abort.abort(new Error('Client disconnected')));
      const chunks = deps.orchestrator.respond(verdict.cleanedInput, {
        sessionId: sessionId ?? null,
        signal: abort.signal,
      });
      for await (const chunk of chunks) {
        if (s.aborted) break;
        await s.write(chunk);
      }
    });
  });

  return qa;
}
