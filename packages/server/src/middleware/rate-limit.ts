/**
 * Per-client request budgets for the processing routes. Each limiter owns
 * its windows, so asset and HTML traffic are counted apart. State is in
 * memory: one budget per server process.
 */

import { createMiddleware } from "hono/factory";
import type { Context } from "hono";
import { getConnInfo } from "@hono/node-server/conninfo";
import { getLocale, t } from "../lib/i18n.js";

export interface RateLimiterOptions {
  windowMs: number;
  /** Requests a client may make per window. */
  max: number;
  /** Take the client from the first X-Forwarded-For hop. */
  trustedProxy?: boolean;
}

export interface Spend {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  retryAfterMs: number;
}

interface Window {
  used: number;
  resetAt: number;
}

const LOOPBACK_ADDRESSES = new Set(["127.0.0.1", "::1", "::ffff:127.0.0.1"]);

/** Fixed-window counter per client key. Expired windows are pruned lazily. */
export class RequestBudget {
  private readonly windows = new Map<string, Window>();
  private nextPruneAt = 0;

  constructor(
    private readonly max: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  take(client: string): Spend {
    const now = this.now();
    if (now >= this.nextPruneAt) {
      for (const [key, window] of this.windows) {
        if (window.resetAt <= now) this.windows.delete(key);
      }
      this.nextPruneAt = now + this.windowMs;
    }

    let window = this.windows.get(client);
    if (!window || window.resetAt <= now) {
      window = { used: 0, resetAt: now + this.windowMs };
      this.windows.set(client, window);
    }
    window.used++;

    return {
      allowed: window.used <= this.max,
      remaining: Math.max(0, this.max - window.used),
      resetAt: window.resetAt,
      retryAfterMs: window.resetAt - now,
    };
  }

  get size(): number {
    return this.windows.size;
  }
}

export function clientIp(c: Context, trustedProxy: boolean): string {
  if (trustedProxy) {
    return c.req.header("x-forwarded-for")?.split(",")[0]?.trim() || "unknown";
  }
  try {
    return getConnInfo(c).remote.address ?? "unknown";
  } catch {
    // app.request() in tests has no socket.
    return "unknown";
  }
}

export function rateLimiter(opts: RateLimiterOptions) {
  const budget = new RequestBudget(opts.max, opts.windowMs);

  return createMiddleware(async (c, next) => {
    const ip = clientIp(c, opts.trustedProxy ?? false);
    // The CLI and local scripts talk to the server over loopback.
    if (LOOPBACK_ADDRESSES.has(ip)) {
      await next();
      return;
    }

    const spend = budget.take(ip);
    c.header("X-RateLimit-Limit", String(opts.max));
    c.header("X-RateLimit-Remaining", String(spend.remaining));
    c.header("X-RateLimit-Reset", String(Math.ceil(spend.resetAt / 1000)));

    if (!spend.allowed) {
      c.header("Retry-After", String(Math.ceil(spend.retryAfterMs / 1000)));
      return c.json({ error: t(getLocale(c), "common.too_many_requests"), code: "RateLimited" }, 429);
    }
    await next();
  });
}
