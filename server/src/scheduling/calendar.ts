import { z } from 'zod';
import logger from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import type { AppConfig } from '../lib/config.js';

const CALENDAR_API_BASE = 'https://www.googleapis.com/calendar/v3';
// Refresh a little before Google says the token dies.
const TOKEN_EXPIRY_SKEW_MS = 60_000;

export interface InterviewEventInput {
  startTime: string;
  candidateEmail: string;
  candidateName: string;
  durationHours?: number;
}

export interface CreatedEvent {
  id?: string;
  htmlLink?: string;
}

export interface CalendarService {
  findAvailableSlots(): Promise<string[]>;
  createInterviewEvent(input: InterviewEventInput): Promise<CreatedEvent>;
}

export class CalendarError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'CalendarError';
    this.status = status;
  }
}

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const eventListSchema = z.object({
  items: z.array(z.object({
    start: z.object({
      dateTime: z.string().optional(),
      date: z.string().optional(),
    }).optional(),
  })).optional(),
});

const createdEventSchema = z.object({
  id: z.string().optional(),
  htmlLink: z.string().optional(),
});

type FetchLike = typeof fetch;

const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Start times without an offset are wall-clock UTC, never server-local. */
export function parseStartTime(raw: string): Date {
  const trimmed = raw.trim();
  return NAIVE_DATE_TIME.test(trimmed)
    ? new Date(`${trimmed.replace(' ', 'T')}Z`)
    : new Date(trimmed);
}

/**
 * Google Calendar v3 over plain REST. Credentials come from an OAuth refresh
 * token; the short-lived access token is cached until shortly before expiry.
 */
export class GoogleCalendarService implements CalendarService {
  private readonly config: AppConfig['calendar'];
  private readonly fetchImpl: FetchLike;
  private accessToken: { value: string; expiresAt: number } | null = null;

  constructor(config: AppConfig['calendar'], fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  hasCredentials(): boolean {
    return Boolean(this.config.clientId && this.config.clientSecret && this.config.refreshToken);
  }

  async findAvailableSlots(): Promise<string[]> {
    const token = await this.getAccessToken().catch((err: unknown) => {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to obtain calendar credentials');
      return null;
    });
    if (!token) return [];

    const now = new Date();
    const timeMax = new Date(now.getTime() + this.config.searchDays * 24 * 60 * 60 * 1000);
    const params = new URLSearchParams({
      timeMin: now.toISOString(),
      timeMax: timeMax.toISOString(),
      q: this.config.searchQuery,
      singleEvents: 'true',
      orderBy: 'startTime',
    });

    try {
      const body = await this.request(
        `/calendars/${encodeURIComponent(this.config.calendarId)}/events?${params.toString()}`,
        token,
        { method: 'GET' },
      );
      const parsed = eventListSchema.parse(body);
      const items = parsed.items ?? [];
      if (items.length === 0) {
        logger.info(
          { query: this.config.searchQuery, days: this.config.searchDays },
          'No interview blocks found in search window',
        );
        return [];
      }
      return items
        .map((event) => event.start?.dateTime ?? event.start?.date)
        .filter((slot): slot is string => typeof slot === 'string');
    } catch (err) {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Google Calendar lookup failed');
      return [];
    }
  }

  async createInterviewEvent(input: InterviewEventInput): Promise<CreatedEvent> {
    const token = await this.getAccessToken();
    if (!token) {
      throw new CalendarError('Could not obtain Google API credentials.');
    }

    const start = parseStartTime(input.startTime);
    if (Number.isNaN(start.getTime())) {
      throw new CalendarError(`Invalid start time: ${input.startTime}`);
    }
    const durationHours = input.durationHours ?? this.config.defaultDurationHours;
    const end = new Date(start.getTime() + durationHours * 60 * 60 * 1000);

    const attendees = [{ email: input.candidateEmail }];
    if (this.config.ownerEmail) {
      attendees.push({ email: this.config.ownerEmail });
    }

    const event = {
      summary: `Interview with ${input.candidateName}`,
      location: this.config.location,
      description: `Interview with candidate ${input.candidateName}.`,
      start: { dateTime: start.toISOString(), timeZone: 'UTC' },
      end: { dateTime: end.toISOString(), timeZone: 'UTC' },
      attendees,
      reminders: {
        useDefault: false,
        overrides: [
          { method: 'email', minutes: this.config.reminderEmailMinutes },
          { method: 'popup', minutes: this.config.reminderPopupMinutes },
        ],
      },
    };

    const body = await this.request(
      `/calendars/${encodeURIComponent(this.config.calendarId)}/events`,
      token,
      { method: 'POST', body: JSON.stringify(event) },
    );
    const created = createdEventSchema.parse(body);
    logger.info({ eventId: created.id, htmlLink: created.htmlLink }, 'Interview event created');
    return created;
  }

  private async getAccessToken(): Promise<string | null> {
    const { clientId, clientSecret, refreshToken, tokenUri } = this.config;
    if (!clientId || !clientSecret || !refreshToken) {
      logger.error(
        'No Google Calendar credentials configured. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN.',
      );
      return null;
    }

    if (this.accessToken && this.accessToken.expiresAt > Date.now()) {
      return this.accessToken.value;
    }

    const response = await withRetry(async () => {
      const res = await this.fetchImpl(tokenUri, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: clientId,
          client_secret: clientSecret,
          refresh_token: refreshToken,
          grant_type: 'refresh_token',
        }).toString(),
      });
      if (!res.ok) {
        const errText = await res.text().catch(() => '');
        throw new CalendarError(`Token refresh failed (${res.status}): ${errText}`, res.status);
      }
      return res.json();
    });

    const token = tokenResponseSchema.parse(response);
    const ttlMs = (token.expires_in ?? 3600) * 1000;
    this.accessToken = {
      value: token.access_token,
      expiresAt: Date.now() + Math.max(ttlMs - TOKEN_EXPIRY_SKEW_MS, 0),
    };
    return token.access_token;
  }

  private async request(path: string, token: string, init: { method: string; body?: string }): Promise<unknown> {
    return withRetry(async () => {
      const res = await this.fetchImpl(`${CALENDAR_API_BASE}${path}`, {
        method: init.method,
        headers: {
          'Authorization': `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: init.body,
      });
      if (!res.ok) {
        const errText = await res.text().catch(() => '');
        throw new CalendarError(`Google Calendar API error ${res.status}: ${errText}`, res.status);
      }
      return res.json();
    }, {
      onRetry: (attempt, error) => {
        logger.warn({ attempt, error: error.message }, 'Retrying Google Calendar request');
      },
    });
  }
}
