import { fetchWithRetry, type FetchFn } from '../net/fetchWithRetry';
import { moduleLogger } from '../logger';
import { CONFIG } from '../config';
import { isSubdomain, normalizeHostname, splitCrtShNames, uniqueEverSeen } from '../subdomain';

const logger = moduleLogger('crtsh');

export interface CrtShOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  retries?: number;
  fetchImpl?: FetchFn;
}

function rowNames(row: unknown): string {
  if (typeof row !== 'object' || row === null) return '';
  if ('name_value' in row && typeof row.name_value === 'string' && row.name_value) return row.name_value;
  if ('common_name' in row && typeof row.common_name === 'string') return row.common_name;
  return '';
}

/** Extract normalized in-scope names from a decoded crt.sh JSON payload. */
export function parseCrtShRows(data: unknown, domain: string): string[] {
  if (!Array.isArray(data)) return [];
  const names: string[] = [];
  for (const row of data) {
    for (const raw of splitCrtShNames(rowNames(row))) {
      const normalized = normalizeHostname(raw);
      if (normalized && isSubdomain(normalized, domain)) names.push(normalized);
    }
  }
  return uniqueEverSeen(names);
}

/**
 * crt.sh — Certificate Transparency log search for `%.<domain>`.
 * Any failure (timeout, non-200, malformed payload) yields an empty list.
 */
export async function fetchCrtSh(domain: string, opts: CrtShOptions = {}): Promise<string[]> {
  const base = opts.baseUrl ?? CONFIG.CRTSH.URL;
  const url = `${base}?q=%25.${encodeURIComponent(domain)}&output=json`;
  try {
    const res = await fetchWithRetry(
      url,
      { headers: { 'User-Agent': opts.userAgent ?? CONFIG.CRTSH.USER_AGENT, Accept: 'application/json' } },
      {
        retries: opts.retries ?? 2,
        backoffMs: 500,
        timeoutMs: opts.timeoutMs ?? CONFIG.CRTSH.TIMEOUT_MS,
        fetchImpl: opts.fetchImpl,
      },
    );
    if (res.status !== 200) {
      logger.warn({ domain, status: res.status }, 'crt.sh returned non-200 status');
      return [];
    }
    const data: unknown = await res.json();
    if (!Array.isArray(data)) {
      logger.warn({ domain }, 'crt.sh payload is not an array');
      return [];
    }
    return parseCrtShRows(data, domain);
  } catch (err) {
    logger.warn({ err, domain }, 'crt.sh fetch failed');
    return [];
  }
}

export default fetchCrtSh;
