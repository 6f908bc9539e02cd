import logger from '../lib/logger.js';

export const MAX_QUESTION_LENGTH = 500;
export const MAX_NAME_LENGTH = 100;
export const MAX_EMAIL_LENGTH = 254;
export const MAX_TIME_LENGTH = 50;

const ALLOWED_CONTROL_CHARS = new Set(['\t', '\n', '\r', ' ']);

/**
 * Normalizes raw user text before it reaches a prompt or a log line.
 *
 * Drops control characters (tab, newline and carriage return survive until
 * whitespace collapsing), collapses every whitespace run to a single space,
 * then truncates to `maxLength` code points and trims the cut edge.
 *
 * Idempotent: `sanitize(sanitize(x, n), n) === sanitize(x, n)`.
 */
export function sanitize(text: string | null | undefined, maxLength?: number): string {
  if (!text) return '';

  let cleaned = '';
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code >= 32 || ALLOWED_CONTROL_CHARS.has(char)) {
      cleaned += char;
    }
  }

  cleaned = cleaned.replace(/\u0000/g, '');
  cleaned = cleaned.split(/\s+/).filter(Boolean).join(' ');

  const chars = Array.from(cleaned);
  if (maxLength !== undefined && chars.length > maxLength) {
    cleaned = chars.slice(0, maxLength).join('').trimEnd();
    logger.warn({ maxLength }, 'Input truncated');
  }

  return cleaned;
}
