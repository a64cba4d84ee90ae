/**
 * Redis connection for scan history, using `ioredis`.
 *
 * `getRedisClient()` returns a connected client or `null` when `REDIS_URL`
 * is not set or the server does not answer a ping. Callers treat `null` as
 * "history unavailable" and carry on without it.
 */

import Redis from 'ioredis';
import { CONFIG } from './config';
import { moduleLogger } from './logger';

const logger = moduleLogger('redis');

let client: Redis | null = null;

export async function getRedisClient(url: string | null = CONFIG.REDIS_URL): Promise<Redis | null> {
  if (client) return client;
  if (!url) return null;

  client = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: 2,
  });

  try {
    await client.ping();
    return client;
  } catch (err) {
    client.disconnect();
    client = null;
    logger.warn({ err }, 'Redis not available, history disabled for this call');
    return null;
  }
}

export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}

export default getRedisClient;
