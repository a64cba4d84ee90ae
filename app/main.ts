import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from '../lib/config';
import logger from '../lib/logger';
import { closeRedisClient } from '../lib/redisAdapter';
import { createApp } from './server';
import { createServices } from './services';

const config = loadConfig();
const app = createApp(createServices(config));

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info({ port: info.port }, 'listening');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server.close();
  closeRedisClient().catch((err: unknown) => logger.warn({ err }, 'redis close failed'));
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
