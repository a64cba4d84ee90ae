import type { Context } from 'hono';
import { toProbePayload } from '../../../lib/events';
import { sanitizeDomain } from '../../../lib/subdomain';
import type { AppEnv } from '../../services';

/** GET /api/status?domain= probes a single host. */
export async function GET(c: Context<AppEnv>) {
  const { prober } = c.get('services');
  const name = sanitizeDomain(c.req.query('domain') ?? '');
  if (!name) return c.json({ error: 'invalid domain' }, 400);
  const entry = await prober.probe(name);
  return c.json(toProbePayload(entry));
}
