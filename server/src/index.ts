import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { createProvider, getDefaultModel, hasProviderKey } from './lib/llm.js';
import logger from './lib/logger.js';
import { loadResume } from './lib/resume.js';
import { DialogueOrchestrator } from './qa/orchestrator.js';
import { SessionStore } from './qa/session-store.js';
import { GoogleCalendarService } from './scheduling/calendar.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

export async function startServer() {
  if (server) return server;

  const config = loadConfig();
  const resume = await loadResume(config.resumePath);

  const store = new SessionStore({ timeoutMs: config.sessions.timeoutMs });
  store.startSweep(config.sessions.sweepIntervalMs);

  const orchestrator = new DialogueOrchestrator({
    llm: createProvider(config.llm),
    store,
    model: getDefaultModel(config.llm),
    resumeText: resume.text,
    contextWindow: config.sessions.contextWindow,
    maxTokens: config.llm.maxTokens,
    timeoutMs: config.llm.timeoutMs,
  });

  const calendar = new GoogleCalendarService(config.calendar);
  if (!calendar.hasCredentials()) {
    logger.warn('Google Calendar credentials not set; scheduling endpoints will return no slots');
  }
  if (config.isProduction && config.allowedOrigins.length === 0) {
    logger.error('ALLOWED_ORIGINS not set in production; all cross-origin requests will be blocked');
  }

  const app = createApp({
    store,
    orchestrator,
    calendar,
    allowedOrigins: config.allowedOrigins,
    isProduction: config.isProduction,
    health: () => ({ llmKeyPresent: hasProviderKey(config.llm), resumeLoaded: resume.loaded }),
    isShuttingDown: () => shuttingDown,
  });

  logger.info({ port: config.port, provider: config.llm.provider }, 'Resume Q&A server starting');
  const started = serve({ fetch: app.fetch, port: config.port });
  server = started;
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown initiated');
    store.stopSweep();

    started.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10s if connections don't drain
    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return started;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  });
}
