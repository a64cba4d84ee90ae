import { connect } from 'tls';
import { CONFIG } from './config';
import { createDnsClient, lookupHost, type DnsClient } from './dns';
import { describeError } from './errors';
import { moduleLogger } from './logger';
import { observeProbeLatency } from './metrics';
import type { FetchFn } from './net/fetchWithRetry';
import type { ResolvedRecord, SubdomainEntry } from './types';

const logger = moduleLogger('probe');

export type TlsCheck = (host: string, timeoutMs: number) => Promise<boolean>;

const HTTPS_PORT = 443;

interface HttpAnswer {
  status: number;
  server: string;
}

/** TLS handshake (port 443 unless given) with SNI and the default trust store. */
export function checkTls(host: string, timeoutMs: number, port: number = HTTPS_PORT): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = connect({ host, port, servername: host, timeout: timeoutMs });
    const finish = (ok: boolean) => {
      socket.destroy();
      resolve(ok);
    };
    socket.once('secureConnect', () => finish(socket.authorized));
    socket.once('timeout', () => finish(false));
    socket.once('error', (err) => {
      logger.trace({ host, err }, 'tls handshake failed');
      finish(false);
    });
  });
}

export interface ProberOptions {
  fetchImpl?: FetchFn;
  tlsCheck?: TlsCheck;
  dnsClient?: DnsClient;
  timeoutMs?: number;
  now?: () => Date;
}

export class LivenessProber {
  private readonly fetchImpl: FetchFn;
  private readonly tlsCheck: TlsCheck;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private dnsClient: DnsClient | null;

  constructor(opts: ProberOptions = {}) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.tlsCheck = opts.tlsCheck ?? checkTls;
    this.timeoutMs = opts.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
    this.now = opts.now ?? (() => new Date());
    this.dnsClient = opts.dnsClient ?? null;
  }

  private dns(): DnsClient {
    if (!this.dnsClient) this.dnsClient = createDnsClient();
    return this.dnsClient;
  }

  /** One request; null when nothing answered (timeout, refused, TLS failure). */
  private async request(url: string, method: 'HEAD' | 'GET'): Promise<HttpAnswer | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await this.fetchImpl(url, { method, redirect: 'follow', signal: controller.signal });
    } catch (err) {
      logger.trace({ url, method, err }, 'no http answer');
      return null;
    } finally {
      clearTimeout(timer);
    }
    try {
      await res.body?.cancel();
    } catch (err) {
      logger.trace({ url, err }, 'body discard failed');
    }
    return { status: res.status, server: res.headers.get('server') ?? '' };
  }

  /** HEAD, then GET when the server refuses HEAD with 403/405. */
  private async tryScheme(scheme: 'https' | 'http', name: string): Promise<HttpAnswer | null> {
    const url = `${scheme}://${name}`;
    const head = await this.request(url, 'HEAD');
    if (head && (head.status === 403 || head.status === 405)) {
      return (await this.request(url, 'GET')) ?? head;
    }
    return head;
  }

  async probe(name: string, known: Partial<Pick<ResolvedRecord, 'ips' | 'cname'>> = {}): Promise<SubdomainEntry> {
    const started = performance.now();
    let ips = known.ips ?? [];
    let cname = known.cname ?? null;
    try {
      if (known.ips === undefined || known.cname === undefined) {
        const resolved = await lookupHost(this.dns(), name, CONFIG.DNS_TIMEOUT_MS);
        if (known.ips === undefined) ips = resolved.ips;
        if (known.cname === undefined) cname = resolved.cname;
      }

      let answer = await this.tryScheme('https', name);
      let tls = answer !== null;
      if (!answer) answer = await this.tryScheme('http', name);
      if (!tls) tls = await this.tlsCheck(name, this.timeoutMs);

      return {
        name,
        ips,
        cname,
        httpStatus: answer ? answer.status : null,
        tls,
        server: answer ? answer.server : '',
        lastProbe: this.now().toISOString(),
      };
    } catch (err) {
      logger.warn({ name, error: describeError(err) }, 'probe failed, returning partial result');
      return { name, ips, cname, httpStatus: null, tls: false, server: '', lastProbe: this.now().toISOString() };
    } finally {
      observeProbeLatency((performance.now() - started) / 1000);
    }
  }
}

export default LivenessProber;
