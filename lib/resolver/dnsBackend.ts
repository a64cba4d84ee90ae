import { CONFIG } from '../config';
import { createDnsClient, lookupHost, type DnsClient } from '../dns';
import { mapUnordered } from '../net/worker';
import { normalizeHostname } from '../subdomain';
import type { ResolvedRecord } from '../types';
import type { ResolverBackend } from './types';

export interface DnsBackendOptions {
  client?: DnsClient;
  concurrency?: number;
  timeoutMs?: number;
}

/** Per-host A/AAAA/CNAME queries against a standard resolver, bounded concurrency. */
export class DnsResolverBackend implements ResolverBackend {
  readonly name = 'dns' as const;
  private readonly client: DnsClient;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  constructor(opts: DnsBackendOptions = {}) {
    this.client = opts.client ?? createDnsClient();
    this.concurrency = opts.concurrency ?? CONFIG.CONCURRENCY.RESOLVER;
    this.timeoutMs = opts.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  }

  async resolveOne(candidate: string): Promise<ResolvedRecord | null> {
    const name = normalizeHostname(candidate);
    if (!name) return null;
    const { ips, cname } = await lookupHost(this.client, name, this.timeoutMs);
    if (ips.length === 0 && !cname) return null;
    return { name, ips, cname };
  }

  async *resolve(candidates: readonly string[]): AsyncGenerator<ResolvedRecord> {
    for await (const record of mapUnordered(candidates, this.concurrency, (c) => this.resolveOne(c))) {
      if (record) yield record;
    }
  }
}

export default DnsResolverBackend;
