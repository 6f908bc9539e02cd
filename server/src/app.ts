import { Hono } from 'hono';
import { cors } from 'hono/cors';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { DialogueOrchestrator } from './qa/orchestrator.js';
import type { SessionStore } from './qa/session-store.js';
import { createQaRoutes } from './routes/qa.js';
import { createSchedulingRoutes } from './routes/scheduling.js';
import type { CalendarService } from './scheduling/calendar.js';

export interface AppDeps {
  store: SessionStore;
  orchestrator: DialogueOrchestrator;
  calendar: CalendarService;
  allowedOrigins?: string[];
  isProduction?: boolean;
  /** Extra readiness facts surfaced on /health. */
  health?: () => { llmKeyPresent: boolean; resumeLoaded: boolean };
  rateLimit?: { maxRequests: number; windowMs: number };
  isShuttingDown?: () => boolean;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();
  const isShuttingDown = deps.isShuttingDown ?? (() => false);

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (isShuttingDown() && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    const forwardedProto = c.req.header('x-forwarded-proto')?.split(',')[0]?.trim().toLowerCase();
    if (deps.isProduction && (forwardedProto === 'https' || c.req.url.startsWith('https:'))) {
      c.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains');
    }
  });

  app.use('*', cors({
    origin: deps.allowedOrigins ?? [],
    exposeHeaders: ['X-Session-ID', 'X-Request-ID'],
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const facts = deps.health?.() ?? { llmKeyPresent: true, resumeLoaded: true };
    const sessions = deps.store.getStats();
    const status = isShuttingDown()
      ? 'draining'
      : (facts.llmKeyPresent && facts.resumeLoaded ? 'ok' : 'degraded');
    return c.json({
      status,
      llm_key_present: facts.llmKeyPresent,
      resume_loaded: facts.resumeLoaded,
      active_sessions: sessions.active_sessions,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/qa', createQaRoutes({
    store: deps.store,
    orchestrator: deps.orchestrator,
    rateLimit: deps.rateLimit,
  }));
  app.route('/scheduling', createSchedulingRoutes({
    calendar: deps.calendar,
    rateLimit: deps.rateLimit,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
