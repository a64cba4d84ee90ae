import type { Context } from 'hono';
import { toRunPayload } from '../../../lib/events';
import type { AppEnv } from '../../services';
import { parseBoundedInt } from '../params';

const DEFAULT_LIMIT = 10;

/** GET /api/recent?limit= lists the latest completed runs across all domains. */
export async function GET(c: Context<AppEnv>) {
  const { store, config } = c.get('services');
  const limit = parseBoundedInt(c.req.query('limit'), DEFAULT_LIMIT, 1, 100);
  if (limit === null) return c.json({ error: 'limit must be an integer between 1 and 100' }, 400);
  const recent = await store.recentRuns(Math.min(limit, config.HISTORY.RECENT_LIMIT));
  return c.json({ recent: recent.map(toRunPayload) });
}
