import { Hono } from 'hono';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { formatIssues, validateBody } from '../lib/validate.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { bookingSchema } from '../scheduling/booking.js';
import type { CalendarService } from '../scheduling/calendar.js';

const MAX_BOOKING_BODY_BYTES = 8_000;

export interface SchedulingRouteDeps {
  calendar: CalendarService;
  rateLimit?: { maxRequests: number; windowMs: number };
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createSchedulingRoutes(deps: SchedulingRouteDeps) {
  const scheduling = new Hono();
  const limit = deps.rateLimit ?? { maxRequests: 10, windowMs: 60_000 };

  scheduling.get('/get-availability', async (c) => {
    try {
      const slots = await deps.calendar.findAvailableSlots();
      return c.json({ slots });
    } catch (err) {
      c.get('log').error({ err }, 'Error getting availability');
      return c.json({ error: errorText(err) }, 500);
    }
  });

  scheduling.post('/book-interview', rateLimitMiddleware(limit.maxRequests, limit.windowMs), async (c) => {
    const log = c.get('log');
    const body = await parseJsonBodyWithLimit(c, MAX_BOOKING_BODY_BYTES);
    if (!body.ok) return body.response;

    const parsed = validateBody(bookingSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid booking request', issues: formatIssues(parsed.issues) }, 400);
    }

    const booking = parsed.data;
    log.info({ email: booking.email }, 'Interview booking attempt');
    try {
      const event = await deps.calendar.createInterviewEvent({
        startTime: booking.time,
        candidateEmail: booking.email,
        candidateName: booking.name,
        durationHours: booking.duration_hours,
      });
      return c.json({ status: 'success', event_link: event.htmlLink ?? null });
    } catch (err) {
      log.error({ err }, 'Error booking interview');
      return c.json({ error: errorText(err) }, 500);
    }
  });

  return scheduling;
}
