import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().catch(fallback);

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  ALLOWED_ORIGINS: optionalTrimmed,

  LLM_PROVIDER: z.enum(['openai', 'anthropic']).optional(),
  OPENAI_API_KEY: optionalTrimmed,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: optionalTrimmed,
  ANTHROPIC_MODEL: z.string().min(1).default('claude-3-5-haiku-latest'),
  LLM_MAX_TOKENS: positiveInt(1024),
  LLM_TIMEOUT_MS: positiveInt(30_000),

  RESUME_PATH: z.string().min(1).default('./resume.txt'),
  SESSION_TIMEOUT_SECONDS: positiveInt(3600),
  SESSION_SWEEP_INTERVAL_SECONDS: nonNegativeInt(300),
  CONTEXT_WINDOW_MESSAGES: nonNegativeInt(6),

  OWNER_EMAIL: optionalTrimmed,
  GOOGLE_CLIENT_ID: optionalTrimmed,
  GOOGLE_CLIENT_SECRET: optionalTrimmed,
  GOOGLE_REFRESH_TOKEN: optionalTrimmed,
  GOOGLE_TOKEN_URI: z.string().url().default('https://oauth2.googleapis.com/token'),
  GOOGLE_CALENDAR_ID: z.string().min(1).default('primary'),
  INTERVIEW_SEARCH_QUERY: z.string().min(1).default('interview block'),
  INTERVIEW_LOCATION: z.string().default('Video Call'),
  CALENDAR_SEARCH_DAYS: positiveInt(7),
  INTERVIEW_REMINDER_EMAIL_MINUTES: nonNegativeInt(24 * 60),
  INTERVIEW_REMINDER_POPUP_MINUTES: nonNegativeInt(10),
  DEFAULT_INTERVIEW_DURATION_HOURS: z.coerce.number().min(0.25).max(8).catch(1),
});

export type LLMProviderName = 'openai' | 'anthropic';

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  allowedOrigins: string[];
  llm: {
    provider: LLMProviderName;
    openaiApiKey?: string;
    openaiBaseUrl: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    maxTokens: number;
    timeoutMs: number;
  };
  resumePath: string;
  sessions: {
    timeoutMs: number;
    sweepIntervalMs: number;
    contextWindow: number;
  };
  calendar: {
    ownerEmail?: string;
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
    tokenUri: string;
    calendarId: string;
    searchQuery: string;
    location: string;
    searchDays: number;
    reminderEmailMinutes: number;
    reminderPopupMinutes: number;
    defaultDurationHours: number;
  };
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

/**
 * Parses process configuration from environment variables.
 * Throws with the full issue list when a value cannot be coerced.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  const isProduction = e.NODE_ENV === 'production';

  // Explicit LLM_PROVIDER wins; otherwise pick whichever key is configured.
  const provider: LLMProviderName = e.LLM_PROVIDER
    ?? (e.OPENAI_API_KEY || !e.ANTHROPIC_API_KEY ? 'openai' : 'anthropic');

  return {
    nodeEnv: e.NODE_ENV,
    isProduction,
    port: e.PORT,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : isProduction ? [] : DEV_ORIGINS,
    llm: {
      provider,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      openaiModel: e.OPENAI_MODEL,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      anthropicModel: e.ANTHROPIC_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    resumePath: e.RESUME_PATH,
    sessions: {
      timeoutMs: e.SESSION_TIMEOUT_SECONDS * 1000,
      sweepIntervalMs: e.SESSION_SWEEP_INTERVAL_SECONDS * 1000,
      contextWindow: e.CONTEXT_WINDOW_MESSAGES,
    },
    calendar: {
      ownerEmail: e.OWNER_EMAIL,
      clientId: e.GOOGLE_CLIENT_ID,
      clientSecret: e.GOOGLE_CLIENT_SECRET,
      refreshToken: e.GOOGLE_REFRESH_TOKEN,
      tokenUri: e.GOOGLE_TOKEN_URI,
      calendarId: e.GOOGLE_CALENDAR_ID,
      searchQuery: e.INTERVIEW_SEARCH_QUERY,
      location: e.INTERVIEW_LOCATION,
      searchDays: e.CALENDAR_SEARCH_DAYS,
      reminderEmailMinutes: e.INTERVIEW_REMINDER_EMAIL_MINUTES,
      reminderPopupMinutes: e.INTERVIEW_REMINDER_POPUP_MINUTES,
      defaultDurationHours: e.DEFAULT_INTERVIEW_DURATION_HOURS,
    },
  };
}
