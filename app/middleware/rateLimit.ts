import type { MiddlewareHandler } from 'hono';
import { quotaHeaders, RateLimitExceeded, type SlidingWindowRateLimiter } from '../../lib/limits';
import { moduleLogger } from '../../lib/logger';
import type { AppEnv } from '../services';

const logger = moduleLogger('rate-limit');

/**
 * Admits or rejects each request against the sliding window. Admitted
 * responses carry the remaining quota; rejections are 429 with Retry-After.
 */
export function createRateLimitMiddleware(limiter: SlidingWindowRateLimiter): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const key = limiter.identify(c.req.header('x-forwarded-for'), c.env?.incoming?.socket?.remoteAddress);
    try {
      const quota = await limiter.hit(key);
      for (const [name, value] of Object.entries(quotaHeaders(quota))) c.header(name, value);
    } catch (err) {
      if (!(err instanceof RateLimitExceeded)) throw err;
      logger.debug({ key, retryAfterMs: err.retryAfterMs }, 'request rate limited');
      for (const [name, value] of Object.entries(err.headers())) c.header(name, value);
      return c.json({ error: 'rate limit exceeded', retry_after: err.retryAfterSeconds }, 429);
    }
    await next();
  };
}
