/**
 * Discovery pass for one root domain.
 *
 * cache-check -> started -> collecting -> resolving -> probing -> persisting -> done
 * (any state may end in `error`). Events go out through a bounded
 * `EventChannel`; a consumer that goes away detaches the channel but the pass
 * still runs to the end and persists.
 */

import pLimit from 'p-limit';
import { CONFIG } from './config';
import { describeError, InvalidDomainError } from './errors';
import { entryEvent } from './events';
import { moduleLogger } from './logger';
import { incScan } from './metrics';
import { EventChannel } from './net/channel';
import type { LivenessProber } from './probe';
import type { ResolverBackend } from './resolver';
import type { ScanStore } from './store';
import { compareNames, isSubdomain, sanitizeDomain } from './subdomain';
import type { CachedSnapshot, ResolvedRecord, ScanEvent, SubdomainEntry } from './types';

const logger = moduleLogger('pipeline');

export interface PipelineDeps {
  store: ScanStore;
  collector: { collect(domain: string): Promise<string[]> };
  selectBackend: () => Promise<ResolverBackend>;
  prober: Pick<LivenessProber, 'probe'>;
  probeConcurrency?: number;
  streamBuffer?: number;
  now?: () => Date;
  /** Monotonic milliseconds. */
  clock?: () => number;
}

export interface SearchOptions {
  refresh?: boolean;
}

export interface ScanHandle {
  events: EventChannel<ScanEvent>;
  /** Settles once the pass has finished and persisted; never rejects. */
  completion: Promise<void>;
}

type Emit = (event: ScanEvent) => Promise<void>;

type Step =
  | { kind: 'record'; result: IteratorResult<ResolvedRecord> }
  | { kind: 'probe'; id: number; ok: true; entry: SubdomainEntry }
  | { kind: 'probe'; id: number; ok: false; error: unknown };

export function mergeEntries(cached: Iterable<SubdomainEntry>, fresh: Iterable<SubdomainEntry>): SubdomainEntry[] {
  const merged = new Map<string, SubdomainEntry>();
  for (const entry of cached) merged.set(entry.name, entry);
  for (const entry of fresh) merged.set(entry.name, entry);
  return Array.from(merged.values()).sort((a, b) => compareNames(a.name, b.name));
}

export class ScanPipeline {
  private readonly store: ScanStore;
  private readonly collector: PipelineDeps['collector'];
  private readonly selectBackend: () => Promise<ResolverBackend>;
  private readonly prober: Pick<LivenessProber, 'probe'>;
  private readonly probeConcurrency: number;
  private readonly streamBuffer: number;
  private readonly now: () => Date;
  private readonly clock: () => number;

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.collector = deps.collector;
    this.selectBackend = deps.selectBackend;
    this.prober = deps.prober;
    this.probeConcurrency = deps.probeConcurrency ?? CONFIG.CONCURRENCY.PROBE;
    this.streamBuffer = deps.streamBuffer ?? CONFIG.STREAM_BUFFER;
    this.now = deps.now ?? (() => new Date());
    this.clock = deps.clock ?? (() => performance.now());
  }

  /** Throws `InvalidDomainError` before any work when `domain` is not a valid root. */
  start(domain: string, opts: SearchOptions = {}): ScanHandle {
    const normalized = sanitizeDomain(domain);
    if (!normalized) throw new InvalidDomainError(domain);
    const events = new EventChannel<ScanEvent>(this.streamBuffer);
    const completion = this.produce(normalized, opts.refresh ?? false, events);
    return { events, completion };
  }

  search(domain: string, opts: SearchOptions = {}): EventChannel<ScanEvent> {
    return this.start(domain, opts).events;
  }

  private async produce(domain: string, refresh: boolean, channel: EventChannel<ScanEvent>): Promise<void> {
    const emit: Emit = (event) => channel.push(event);
    try {
      const snapshot = await this.loadSnapshot(domain);
      if (snapshot.entries.length > 0) {
        await emit({ stage: 'cache_hit', domain, count: snapshot.entries.length });
        for (const entry of snapshot.entries) await emit(entryEvent(entry));
        if (!refresh) {
          const { meta } = snapshot;
          await emit({
            stage: 'done',
            domain,
            total_unique: meta ? meta.totalUnique : snapshot.entries.length,
            cached_at: meta ? meta.cachedAt : null,
            duration_ms: meta ? meta.durationMs : null,
          });
          incScan('cache_hit');
          return;
        }
      }
      await this.freshPass(domain, snapshot, emit);
    } catch (err) {
      logger.error({ domain, err }, 'scan aborted outside the discovery pass');
    } finally {
      channel.close();
    }
  }

  private async freshPass(domain: string, snapshot: CachedSnapshot, emit: Emit): Promise<void> {
    await emit({ stage: 'started', domain });
    const runId = await this.startRun(domain);
    const startedAt = this.clock();
    const fresh: SubdomainEntry[] = [];

    try {
      const candidates = await this.collector.collect(domain);
      await emit({ stage: 'crt_sh_found', domain, count: candidates.length });

      const backend = await this.selectBackend();
      await emit({ stage: 'resolving', domain, resolver: backend.name, count: candidates.length });

      const known = new Set(candidates);
      for (const entry of snapshot.entries) {
        if (!known.has(entry.name)) candidates.push(entry.name);
      }

      for await (const entry of this.resolveAndProbe(domain, backend, candidates)) {
        fresh.push(entry);
        await emit(entryEvent(entry));
      }
    } catch (err) {
      const message = describeError(err);
      logger.error({ domain, err }, 'discovery pass failed');
      await emit({ stage: 'error', domain, error: message });
      await this.persist(domain, runId, mergeEntries(snapshot.entries, fresh), startedAt);
      incScan('failed');
      return;
    }

    const merged = mergeEntries(snapshot.entries, fresh);
    const durationMs = await this.persist(domain, runId, merged, startedAt);
    await emit({
      stage: 'done',
      domain,
      total_unique: merged.length,
      cached_at: this.now().toISOString(),
      duration_ms: durationMs,
    });
    incScan('completed');
    logger.info({ domain, total: merged.length, fresh: fresh.length, durationMs }, 'scan completed');
  }

  /**
   * Probe every resolved record as soon as it arrives, so probing overlaps
   * resolution. Entries come out in probe completion order; records outside
   * `domain` are dropped.
   */
  private async *resolveAndProbe(
    domain: string,
    backend: ResolverBackend,
    candidates: string[],
  ): AsyncGenerator<SubdomainEntry> {
    const limit = pLimit(Math.max(1, this.probeConcurrency));
    const records = backend.resolve(candidates)[Symbol.asyncIterator]();
    const pending = new Map<number, Promise<Step>>();
    let nextRecord: Promise<Step> | null = records.next().then((result): Step => ({ kind: 'record', result }));
    let id = 0;

    while (nextRecord || pending.size > 0) {
      const racers: Promise<Step>[] = [...pending.values()];
      if (nextRecord) racers.push(nextRecord);
      const step = await Promise.race(racers);

      if (step.kind === 'record') {
        if (step.result.done) {
          nextRecord = null;
          continue;
        }
        const record = step.result.value;
        if (!isSubdomain(record.name, domain)) {
          logger.debug({ domain, name: record.name }, 'resolver returned a name outside the scanned domain');
        } else if (record.ips.length > 0 || record.cname) {
          const probeId = id++;
          pending.set(
            probeId,
            limit(() => this.prober.probe(record.name, { ips: record.ips, cname: record.cname })).then(
              (entry): Step => ({ kind: 'probe', id: probeId, ok: true, entry }),
              (error: unknown): Step => ({ kind: 'probe', id: probeId, ok: false, error }),
            ),
          );
        }
        nextRecord = records.next().then((result): Step => ({ kind: 'record', result }));
        continue;
      }

      pending.delete(step.id);
      if (!step.ok) throw step.error;
      yield step.entry;
    }
  }

  private async loadSnapshot(domain: string): Promise<CachedSnapshot> {
    try {
      return await this.store.loadSnapshot(domain);
    } catch (err) {
      logger.warn({ domain, err }, 'snapshot load failed, scanning without cache');
      return { entries: [], meta: null };
    }
  }

  private async startRun(domain: string): Promise<number | null> {
    try {
      return await this.store.startRun(domain);
    } catch (err) {
      logger.warn({ domain, err }, 'could not record scan run');
      return null;
    }
  }

  /** Best effort: a store failure is logged and the elapsed time still returned. */
  private async persist(domain: string, runId: number | null, entries: SubdomainEntry[], startedAt: number): Promise<number> {
    const durationMs = Math.floor(this.clock() - startedAt);
    try {
      await this.store.upsertEntries(domain, entries, runId);
      await this.store.completeRun(runId, entries.length, durationMs);
    } catch (err) {
      logger.warn({ domain, runId, err }, 'failed to persist scan results');
    }
    return durationMs;
  }
}

export default ScanPipeline;
