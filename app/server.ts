import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { describeError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { register } from '../lib/metrics';
import { GET as history } from './api/history/route';
import { GET as recent } from './api/recent/route';
import { GET as search } from './api/search/route';
import { GET as status } from './api/status/route';
import { createRateLimitMiddleware } from './middleware/rateLimit';
import type { AppEnv, Services } from './services';

const logger = moduleLogger('http');

export const APP_NAME = 'subdomain-radar';
export const APP_VERSION = '0.1.0';

export function createApp(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { config } = services;

  app.use('*', cors());
  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });
  if (services.limiter) app.use('/api/*', createRateLimitMiddleware(services.limiter));

  app.get('/api/search', search);
  app.get('/api/status', status);
  app.get('/api/history', history);
  app.get('/api/recent', recent);

  app.get('/healthz', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.get('/metrics', async (c) => {
    c.header('Content-Type', register.contentType);
    return c.body(await register.metrics());
  });

  app.get('/', async (c) =>
    c.json({
      name: APP_NAME,
      version: APP_VERSION,
      status: 'ok',
      features: {
        history_enabled: services.store.enabled,
        massdns_available: (await services.locateMassdns()) !== null,
      },
      rate_limit: {
        requests: config.RATE_LIMIT.REQUESTS,
        window_seconds: config.RATE_LIMIT.WINDOW_MS / 1000,
      },
    }),
  );

  app.notFound((c) => c.json({ error: 'not found' }, 404));
  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    logger.error({ err, path: c.req.path }, 'request failed');
    return c.json({ error: describeError(err) }, 500);
  });

  return app;
}

export default createApp;
