import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const MAX_BUCKETS = 50_000;

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

function socketAddress(c: Context): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // No Node socket bindings, e.g. app.request() or another adapter.
    return undefined;
  }
}

function clientIdentifier(c: Context): string {
  if (process.env.TRUST_PROXY === 'true') {
    const forwarded = c.req.header('x-forwarded-for')?.split(',')[0];
    if (forwarded?.trim()) return `ip:${trimKeySegment(forwarded)}`;
  }
  const address = socketAddress(c);
  return address ? `ip:${trimKeySegment(address)}` : 'anonymous';
}

/**
 * Fixed-window rate limiter keyed by client IP and route. The forwarded
 * address is used only when TRUST_PROXY=true; otherwise the socket peer.
 * Each call owns its own buckets.
 * @param maxRequests - Max requests allowed in the window
 * @param windowMs - Window duration in milliseconds
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number) {
  const buckets = new Map<string, RateLimitEntry>();

  const prune = (now: number) => {
    for (const [key, entry] of buckets) {
      if (now >= entry.resetAt) buckets.delete(key);
    }
    while (buckets.size > MAX_BUCKETS) {
      const oldest = buckets.keys().next().value;
      if (oldest === undefined) break;
      buckets.delete(oldest);
    }
  };

  return async (c: Context, next: Next) => {
    const now = Date.now();
    const key = `${clientIdentifier(c)}:${c.req.method}:${c.req.path}`;

    let entry = buckets.get(key);
    if (!entry || now >= entry.resetAt) {
      if (buckets.size >= MAX_BUCKETS) prune(now);
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    }

    entry.count += 1;
    if (entry.count > maxRequests) {
      const retryAfter = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
      logger.warn({ key, retryAfter }, 'Rate limit exceeded');
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'Too many requests. Please slow down.' }, 429);
    }

    await next();
  };
}
