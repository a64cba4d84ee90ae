import { Resolver } from 'dns/promises';
import { withTimeout } from './net/timeout';
import { attempt, valueOr, type Outcome } from './net/outcome';
import { moduleLogger } from './logger';
import { incResolveFailure } from './metrics';
import { CONFIG } from './config';

const logger = moduleLogger('dns');

export type RecordType = 'A' | 'AAAA' | 'CNAME';

/** The subset of `dns.promises.Resolver` the scanner needs. */
export interface DnsClient {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  resolveCname(hostname: string): Promise<string[]>;
}

export interface HostLookup {
  ips: string[];
  cname: string | null;
}

export interface DnsClientOptions {
  servers?: string[];
  timeoutMs?: number;
}

/**
 * Standard resolver; uses the system servers unless `servers` (DNS_SERVERS)
 * is given.
 */
export function createDnsClient(opts: DnsClientOptions = {}): DnsClient {
  const resolver = new Resolver({ timeout: opts.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS, tries: 2 });
  const servers = opts.servers ?? CONFIG.DNS_SERVERS;
  if (servers.length > 0) resolver.setServers(servers);
  return resolver;
}

function query(client: DnsClient, host: string, type: RecordType): Promise<string[]> {
  switch (type) {
    case 'A':
      return client.resolve4(host);
    case 'AAAA':
      return client.resolve6(host);
    case 'CNAME':
      return client.resolveCname(host);
  }
}

/** One record-type query; "no records" and faults come back as a failed Outcome. */
export async function queryRecords(
  client: DnsClient,
  host: string,
  type: RecordType,
  timeoutMs: number = CONFIG.DNS_TIMEOUT_MS,
): Promise<Outcome<string[]>> {
  const outcome = await attempt(() => withTimeout(query(client, host, type), timeoutMs));
  if (!outcome.ok) {
    incResolveFailure(outcome.reason);
    if (outcome.reason === 'no-answer') {
      logger.trace({ host, type }, 'no records');
    } else {
      logger.debug({ host, type, reason: outcome.reason, err: outcome.error }, 'dns query failed');
    }
  }
  return outcome;
}

export function normalizeCname(value: string): string {
  return value.replace(/\.+$/, '').toLowerCase();
}

/**
 * Resolve A, AAAA, then CNAME for a host. Each record type fails
 * independently; the result may be empty.
 */
export async function lookupHost(
  client: DnsClient,
  host: string,
  timeoutMs: number = CONFIG.DNS_TIMEOUT_MS,
): Promise<HostLookup> {
  const a = await queryRecords(client, host, 'A', timeoutMs);
  const aaaa = await queryRecords(client, host, 'AAAA', timeoutMs);
  const cnames = valueOr(await queryRecords(client, host, 'CNAME', timeoutMs), []);
  const ips = Array.from(new Set([...valueOr(a, []), ...valueOr(aaaa, [])])).sort();
  const cname = cnames.length > 0 && cnames[0] ? normalizeCname(cnames[0]) : null;
  return { ips, cname };
}
