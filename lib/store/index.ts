import type { AppConfig } from '../config';
import type { CachedSnapshot, ScanRunSummary, SubdomainEntry } from '../types';
import { RedisScanStore } from './redisStore';

/**
 * Persistence collaborator of the pipeline. Implementations throw
 * `StoreError` on backend faults; callers decide whether that is fatal.
 */
export interface ScanStore {
  readonly enabled: boolean;
  startRun(domain: string): Promise<number | null>;
  completeRun(runId: number | null, total: number, durationMs: number): Promise<void>;
  loadSnapshot(domain: string): Promise<CachedSnapshot>;
  upsertEntries(domain: string, entries: readonly SubdomainEntry[], runId: number | null): Promise<void>;
  recentRuns(limit: number): Promise<ScanRunSummary[]>;
  runsForDomain(domain: string, limit: number): Promise<ScanRunSummary[]>;
}

/** History disabled: writes vanish, reads are empty. */
export class NullScanStore implements ScanStore {
  readonly enabled = false;

  async startRun(): Promise<number | null> {
    return null;
  }

  async completeRun(): Promise<void> {}

  async loadSnapshot(): Promise<CachedSnapshot> {
    return { entries: [], meta: null };
  }

  async upsertEntries(): Promise<void> {}

  async recentRuns(): Promise<ScanRunSummary[]> {
    return [];
  }

  async runsForDomain(): Promise<ScanRunSummary[]> {
    return [];
  }
}

export function createScanStore(config: Pick<AppConfig, 'HISTORY' | 'REDIS_URL' | 'CACHE_KEY_PREFIX'>): ScanStore {
  if (!config.HISTORY.ENABLED || !config.REDIS_URL) return new NullScanStore();
  return new RedisScanStore({ prefix: config.CACHE_KEY_PREFIX });
}

export { RedisScanStore } from './redisStore';
export type { RedisLike } from './redisStore';
