import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { InvalidDomainError } from '../../../lib/errors';
import { toSseMessage } from '../../../lib/events';
import { moduleLogger } from '../../../lib/logger';
import type { EventChannel } from '../../../lib/net/channel';
import type { ScanEvent } from '../../../lib/types';
import type { AppEnv } from '../../services';
import { parseFlag } from '../params';

const logger = moduleLogger('api/search');

/** GET /api/search?domain=&refresh= streams the discovery pass as server-sent events. */
export async function GET(c: Context<AppEnv>) {
  const { pipeline } = c.get('services');
  const domain = c.req.query('domain') ?? '';
  let events: EventChannel<ScanEvent>;
  try {
    events = pipeline.search(domain, { refresh: parseFlag(c.req.query('refresh')) });
  } catch (err) {
    if (err instanceof InvalidDomainError) return c.json({ error: 'invalid domain' }, 400);
    throw err;
  }

  c.header('Cache-Control', 'no-cache');
  c.header('X-Accel-Buffering', 'no');
  return streamSSE(c, async (stream) => {
    stream.onAbort(() => logger.debug({ domain }, 'client disconnected, scan continues in background'));
    for await (const event of events) {
      // leaving the loop detaches the channel; the pass still completes
      if (stream.aborted) break;
      await stream.writeSSE(toSseMessage(event));
    }
  });
}
