import { z } from 'zod';
import { MAX_EMAIL_LENGTH, MAX_NAME_LENGTH, MAX_TIME_LENGTH, sanitize } from '../qa/sanitize.js';

export const MIN_DURATION_HOURS = 0.25;
export const MAX_DURATION_HOURS = 8;

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const NAME_PATTERN = /^[\p{L}\p{N}_\s\-'.]+$/u;

export function validateEmail(email: string): boolean {
  if (!email || email.length > MAX_EMAIL_LENGTH) return false;
  return EMAIL_PATTERN.test(email);
}

export function validateName(name: string): boolean {
  if (!name || name.length > MAX_NAME_LENGTH) return false;
  return NAME_PATTERN.test(name);
}

/**
 * Parses a free-text duration in hours. Accepts "1.5" and "1,5".
 * Returns [false, 0] outside [0.25, 8] or when unparseable.
 */
export function parseDuration(raw: string | null | undefined): [boolean, number] {
  if (!raw || !raw.trim()) return [false, 0];
  const normalized = raw.trim().replace(',', '.');
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(normalized)) return [false, 0];
  const duration = Number(normalized);
  if (!Number.isFinite(duration) || duration < MIN_DURATION_HOURS || duration > MAX_DURATION_HOURS) {
    return [false, 0];
  }
  return [true, duration];
}

export const bookingSchema = z.object({
  name: z.string()
    .transform((v) => sanitize(v.trim(), MAX_NAME_LENGTH))
    .refine((v) => v.length > 0, 'Name cannot be empty')
    .refine(validateName, 'Invalid name format'),
  email: z.string()
    .transform((v) => sanitize(v.trim().toLowerCase(), MAX_EMAIL_LENGTH))
    .refine((v) => v.length > 0, 'Email cannot be empty')
    .refine(validateEmail, 'Invalid email format'),
  time: z.string()
    .transform((v) => sanitize(v.trim(), MAX_TIME_LENGTH))
    .refine((v) => v.length > 0, 'Time cannot be empty')
    .refine((v) => !Number.isNaN(Date.parse(v)), 'Time must be an ISO-8601 date-time'),
  // Form posts may send "1,5"; both forms go through parseDuration.
  duration_hours: z.union([z.number(), z.string()], { errorMap: () => ({ message: 'Duration must be a number' }) })
    .transform((v, ctx) => {
      const [ok, hours] = parseDuration(String(v));
      if (!ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid duration: must be between 0.25 and 8 hours' });
        return z.NEVER;
      }
      return hours;
    }),
});

export type BookingRequest = z.infer<typeof bookingSchema>;
