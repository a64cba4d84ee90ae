import type Redis from 'ioredis';
import { CONFIG } from '../config';
import { StoreError } from '../errors';
import { moduleLogger } from '../logger';
import { getRedisClient } from '../redisAdapter';
import { compareNames } from '../subdomain';
import type { CachedSnapshot, ScanRun, ScanRunSummary, SnapshotMeta, SubdomainEntry } from '../types';
import type { ScanStore } from './index';

const logger = moduleLogger('store');

/** The Redis commands the history store issues. */
export interface RedisLike {
  incr(key: string): Promise<number>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  hset(key: string, values: Record<string, string>): Promise<unknown>;
  hgetall(key: string): Promise<Record<string, string>>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  sadd(key: string, members: string[]): Promise<unknown>;
}

export function fromIoredis(redis: Redis): RedisLike {
  return {
    incr: (key) => redis.incr(key),
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    hset: (key, values) => redis.hset(key, values),
    hgetall: (key) => redis.hgetall(key),
    zadd: (key, score, member) => redis.zadd(key, score, member),
    zrevrange: (key, start, stop) => redis.zrevrange(key, start, stop),
    sadd: (key, members) => redis.sadd(key, ...members),
  };
}

async function defaultClient(): Promise<RedisLike | null> {
  const redis = await getRedisClient();
  return redis ? fromIoredis(redis) : null;
}

interface StoredEntry extends SubdomainEntry {
  firstSeen: string;
  lastSeen: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function parseRun(raw: string | null): ScanRun | null {
  if (raw === null) return null;
  const v = parseJson(raw);
  if (!isRecord(v)) return null;
  const { id, domain, startedAt, completedAt, total, durationMs } = v;
  if (typeof id !== 'number' || typeof domain !== 'string' || typeof startedAt !== 'string' || typeof total !== 'number') {
    return null;
  }
  if (completedAt !== null && typeof completedAt !== 'string') return null;
  if (durationMs !== null && typeof durationMs !== 'number') return null;
  return { id, domain, startedAt, completedAt, total, durationMs };
}

function parseEntry(raw: string): StoredEntry | null {
  const v = parseJson(raw);
  if (!isRecord(v)) return null;
  const { name, ips, cname, httpStatus, tls, server, lastProbe, firstSeen, lastSeen } = v;
  if (typeof name !== 'string' || !isStringArray(ips) || typeof tls !== 'boolean' || typeof server !== 'string') return null;
  if (typeof lastProbe !== 'string' || typeof firstSeen !== 'string' || typeof lastSeen !== 'string') return null;
  if (cname !== null && typeof cname !== 'string') return null;
  if (httpStatus !== null && typeof httpStatus !== 'number') return null;
  return { name, ips, cname, httpStatus, tls, server, lastProbe, firstSeen, lastSeen };
}

function toEntry(stored: StoredEntry): SubdomainEntry {
  return {
    name: stored.name,
    ips: stored.ips,
    cname: stored.cname,
    httpStatus: stored.httpStatus,
    tls: stored.tls,
    server: stored.server,
    lastProbe: stored.lastProbe,
  };
}

function newestFirst(a: ScanRun, b: ScanRun): number {
  if (a.completedAt && b.completedAt) return b.completedAt.localeCompare(a.completedAt);
  if (a.completedAt) return -1;
  if (b.completedAt) return 1;
  return b.startedAt.localeCompare(a.startedAt);
}

function toSummary(run: ScanRun): ScanRunSummary {
  return {
    id: run.id,
    domain: run.domain,
    timestamp: run.completedAt ?? run.startedAt,
    total: run.total,
    durationMs: run.durationMs,
  };
}

export interface RedisStoreOptions {
  prefix?: string;
  client?: () => Promise<RedisLike | null>;
  now?: () => Date;
}

/**
 * Scan history in Redis.
 *
 * Keys (all under the configured prefix):
 *   runs:seq              INCR counter for run ids
 *   run:<id>              JSON ScanRun
 *   runs:completed        ZSET id by completion time
 *   runs:domain:<domain>  ZSET id by start time
 *   subdomains:<domain>   HASH name -> JSON entry with firstSeen/lastSeen
 *   run:<id>:names        SET of names the run touched
 */
export class RedisScanStore implements ScanStore {
  readonly enabled = true;
  private readonly prefix: string;
  private readonly client: () => Promise<RedisLike | null>;
  private readonly now: () => Date;

  constructor(opts: RedisStoreOptions = {}) {
    this.prefix = opts.prefix ?? CONFIG.CACHE_KEY_PREFIX;
    this.client = opts.client ?? defaultClient;
    this.now = opts.now ?? (() => new Date());
  }

  private key(k: string): string {
    return `${this.prefix}${k}`;
  }

  /** Runs `fn` against a live client; no client means `fallback`. */
  private async withClient<T>(operation: string, fallback: T, fn: (r: RedisLike) => Promise<T>): Promise<T> {
    const r = await this.client();
    if (!r) return fallback;
    try {
      return await fn(r);
    } catch (err) {
      throw new StoreError(operation, err);
    }
  }

  private async loadRun(r: RedisLike, id: string | number): Promise<ScanRun | null> {
    const run = parseRun(await r.get(this.key(`run:${id}`)));
    if (!run) logger.debug({ id }, 'run record missing or malformed');
    return run;
  }

  private async domainRuns(r: RedisLike, domain: string): Promise<ScanRun[]> {
    const ids = await r.zrevrange(this.key(`runs:domain:${domain}`), 0, -1);
    const runs: ScanRun[] = [];
    for (const id of ids) {
      const run = await this.loadRun(r, id);
      if (run) runs.push(run);
    }
    return runs.sort(newestFirst);
  }

  startRun(domain: string): Promise<number | null> {
    return this.withClient('startRun', null, async (r) => {
      const id = await r.incr(this.key('runs:seq'));
      const started = this.now();
      const run: ScanRun = { id, domain, startedAt: started.toISOString(), completedAt: null, total: 0, durationMs: null };
      await r.set(this.key(`run:${id}`), JSON.stringify(run));
      await r.zadd(this.key(`runs:domain:${domain}`), started.getTime(), String(id));
      return id;
    });
  }

  completeRun(runId: number | null, total: number, durationMs: number): Promise<void> {
    if (runId === null) return Promise.resolve();
    return this.withClient('completeRun', undefined, async (r) => {
      const run = await this.loadRun(r, runId);
      if (!run) return;
      const completed = this.now();
      const updated: ScanRun = { ...run, completedAt: completed.toISOString(), total, durationMs };
      await r.set(this.key(`run:${runId}`), JSON.stringify(updated));
      await r.zadd(this.key('runs:completed'), completed.getTime(), String(runId));
    });
  }

  loadSnapshot(domain: string): Promise<CachedSnapshot> {
    return this.withClient<CachedSnapshot>('loadSnapshot', { entries: [], meta: null }, async (r) => {
      const raw = await r.hgetall(this.key(`subdomains:${domain}`));
      const entries: SubdomainEntry[] = [];
      for (const value of Object.values(raw)) {
        const stored = parseEntry(value);
        if (stored) entries.push(toEntry(stored));
      }
      entries.sort((a, b) => compareNames(a.name, b.name));

      const latest = (await this.domainRuns(r, domain)).find((run) => run.completedAt !== null);
      const meta: SnapshotMeta | null = latest
        ? { cachedAt: latest.completedAt, totalUnique: latest.total, durationMs: latest.durationMs }
        : null;
      return { entries, meta };
    });
  }

  upsertEntries(domain: string, entries: readonly SubdomainEntry[], runId: number | null): Promise<void> {
    if (entries.length === 0) return Promise.resolve();
    return this.withClient('upsertEntries', undefined, async (r) => {
      const hashKey = this.key(`subdomains:${domain}`);
      const existing = await r.hgetall(hashKey);
      const seenAt = this.now().toISOString();
      const values: Record<string, string> = {};
      for (const entry of entries) {
        const raw = existing[entry.name];
        const previous = raw ? parseEntry(raw) : null;
        const stored: StoredEntry = { ...entry, firstSeen: previous?.firstSeen ?? seenAt, lastSeen: seenAt };
        values[entry.name] = JSON.stringify(stored);
      }
      await r.hset(hashKey, values);
      if (runId !== null) {
        await r.sadd(this.key(`run:${runId}:names`), entries.map((e) => e.name));
      }
    });
  }

  recentRuns(limit: number): Promise<ScanRunSummary[]> {
    if (limit <= 0) return Promise.resolve([]);
    return this.withClient<ScanRunSummary[]>('recentRuns', [], async (r) => {
      const ids = await r.zrevrange(this.key('runs:completed'), 0, limit - 1);
      const runs: ScanRunSummary[] = [];
      for (const id of ids) {
        const run = await this.loadRun(r, id);
        if (run) runs.push(toSummary(run));
      }
      return runs;
    });
  }

  runsForDomain(domain: string, limit: number): Promise<ScanRunSummary[]> {
    if (limit <= 0) return Promise.resolve([]);
    return this.withClient<ScanRunSummary[]>('runsForDomain', [], async (r) =>
      (await this.domainRuns(r, domain)).slice(0, limit).map(toSummary),
    );
  }
}

export default RedisScanStore;
