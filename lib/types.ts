/** A hostname with at least one address or a CNAME. */
export interface ResolvedRecord {
  name: string;
  ips: string[]; // sorted, distinct
  cname: string | null;
}

/** Liveness result for one subdomain; the unit persisted and streamed. */
export interface SubdomainEntry {
  name: string;
  ips: string[];
  cname: string | null;
  httpStatus: number | null;
  tls: boolean;
  server: string;
  lastProbe: string; // ISO timestamp
}

export interface SnapshotMeta {
  cachedAt: string | null;
  totalUnique: number;
  durationMs: number | null;
}

export interface CachedSnapshot {
  entries: SubdomainEntry[]; // sorted by name
  meta: SnapshotMeta | null;
}

export interface ScanRun {
  id: number;
  domain: string;
  startedAt: string;
  completedAt: string | null;
  total: number;
  durationMs: number | null;
}

export interface ScanRunSummary {
  id: number;
  domain: string;
  timestamp: string | null;
  total: number;
  durationMs: number | null;
}

// ── wire format (event stream / HTTP payloads) ──

export interface EntryPayload {
  name: string;
  ips: string[];
  cname: string | null;
  http_status: number | null;
  tls: boolean;
  server: string;
}

export type ScanEvent =
  | { stage: 'cache_hit'; domain: string; count: number }
  | { stage: 'started'; domain: string }
  | { stage: 'crt_sh_found'; domain: string; count: number }
  | { stage: 'resolving'; domain: string; resolver: ResolverName; count: number }
  | {
      stage: 'done';
      domain: string;
      total_unique: number;
      cached_at: string | null;
      duration_ms: number | null;
    }
  | { stage: 'error'; domain: string; error: string }
  | ({ type: 'entry' } & EntryPayload);

export type ResolverName = 'massdns' | 'dns';
