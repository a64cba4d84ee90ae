import type { Context } from 'hono';
import { toEntryPayload, toRunPayload } from '../../../lib/events';
import { sanitizeDomain } from '../../../lib/subdomain';
import type { AppEnv } from '../../services';

/** GET /api/history?domain= returns the stored snapshot and recent runs for one domain. */
export async function GET(c: Context<AppEnv>) {
  const { store, config } = c.get('services');
  const domain = sanitizeDomain(c.req.query('domain') ?? '');
  if (!domain) return c.json({ error: 'invalid domain' }, 400);

  const snapshot = await store.loadSnapshot(domain);
  const runs = await store.runsForDomain(domain, config.HISTORY.PER_DOMAIN_LIMIT);
  return c.json({
    domain,
    cached: snapshot.meta ? snapshot.meta.cachedAt : null,
    total: snapshot.meta ? snapshot.meta.totalUnique : snapshot.entries.length,
    results: snapshot.entries.map(toEntryPayload),
    runs: runs.map(toRunPayload),
  });
}
