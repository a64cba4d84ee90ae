import { StoreError } from '../lib/errors';
import { mergeEntries } from '../lib/pipeline';
import { createScanStore, NullScanStore, RedisScanStore } from '../lib/store';
import type { SubdomainEntry } from '../lib/types';
import { FakeRedis } from './helpers/fakeRedis';

function entry(name: string, overrides: Partial<SubdomainEntry> = {}): SubdomainEntry {
  return {
    name,
    ips: ['192.0.2.1'],
    cname: null,
    httpStatus: 200,
    tls: true,
    server: 'nginx',
    lastProbe: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function setup() {
  const redis = new FakeRedis();
  let current = new Date('2024-01-01T00:00:00.000Z');
  const store = new RedisScanStore({ prefix: 'v1:', client: async () => redis, now: () => current });
  const at = (iso: string) => {
    current = new Date(iso);
  };
  return { redis, store, at };
}

describe('RedisScanStore', () => {
  test('records a run, its entries and the snapshot meta', async () => {
    const { store, at } = setup();
    at('2024-01-01T00:00:00.000Z');
    const runId = await store.startRun('example.com');
    expect(runId).toBe(1);

    at('2024-01-01T00:00:05.000Z');
    await store.upsertEntries('example.com', [entry('www.example.com'), entry('api.example.com')], runId);
    at('2024-01-01T00:00:06.000Z');
    await store.completeRun(runId, 2, 1234);

    const snapshot = await store.loadSnapshot('example.com');
    expect(snapshot.entries.map((e) => e.name)).toEqual(['api.example.com', 'www.example.com']);
    expect(snapshot.entries[0]).toEqual(entry('api.example.com'));
    expect(snapshot.meta).toEqual({ cachedAt: '2024-01-01T00:00:06.000Z', totalUnique: 2, durationMs: 1234 });

    await expect(store.recentRuns(10)).resolves.toEqual([
      { id: 1, domain: 'example.com', timestamp: '2024-01-01T00:00:06.000Z', total: 2, durationMs: 1234 },
    ]);
  });

  test('the snapshot is ordered the same way as a merged scan result', async () => {
    const { store } = setup();
    const names = ['www.example.com', 'a0.example.com', 'a.example.com', 'a-b.example.com'];
    await store.upsertEntries('example.com', names.map((n) => entry(n)), null);

    const snapshot = await store.loadSnapshot('example.com');
    const merged = mergeEntries([], names.map((n) => entry(n)));
    expect(snapshot.entries.map((e) => e.name)).toEqual(merged.map((e) => e.name));
    expect(snapshot.entries.map((e) => e.name)).toEqual([
      'a-b.example.com',
      'a.example.com',
      'a0.example.com',
      'www.example.com',
    ]);
  });

  test('upsert is keyed by name, keeps firstSeen and tracks run membership', async () => {
    const { redis, store, at } = setup();
    at('2024-02-01T00:00:00.000Z');
    await store.upsertEntries('example.com', [entry('www.example.com', { httpStatus: 500 })], 1);
    at('2024-03-01T00:00:00.000Z');
    await store.upsertEntries('example.com', [entry('www.example.com', { httpStatus: 200, server: 'caddy' })], 2);

    const hash = redis.hashes.get('v1:subdomains:example.com');
    expect(hash?.size).toBe(1);
    expect(JSON.parse(hash?.get('www.example.com') ?? '{}')).toEqual({
      ...entry('www.example.com', { httpStatus: 200, server: 'caddy' }),
      firstSeen: '2024-02-01T00:00:00.000Z',
      lastSeen: '2024-03-01T00:00:00.000Z',
    });
    expect([...(redis.sets.get('v1:run:2:names') ?? [])]).toEqual(['www.example.com']);
  });

  test('a snapshot without completed runs has no meta', async () => {
    const { store } = setup();
    await store.startRun('example.com');
    await store.upsertEntries('example.com', [entry('a.example.com')], null);
    const snapshot = await store.loadSnapshot('example.com');
    expect(snapshot.entries).toHaveLength(1);
    expect(snapshot.meta).toBeNull();
  });

  test('runs are listed newest completion first, unfinished runs last', async () => {
    const { store, at } = setup();
    at('2024-01-01T00:00:00.000Z');
    const first = await store.startRun('example.com');
    at('2024-01-01T00:01:00.000Z');
    await store.completeRun(first, 3, 100);
    at('2024-01-01T00:02:00.000Z');
    const unfinished = await store.startRun('example.com');
    at('2024-01-01T00:03:00.000Z');
    const third = await store.startRun('example.com');
    at('2024-01-01T00:04:00.000Z');
    await store.completeRun(third, 4, 200);
    await store.startRun('other.org');

    const runs = await store.runsForDomain('example.com', 10);
    expect(runs.map((r) => r.id)).toEqual([third, first, unfinished]);
    expect(runs[2]).toEqual({
      id: unfinished,
      domain: 'example.com',
      timestamp: '2024-01-01T00:02:00.000Z',
      total: 0,
      durationMs: null,
    });
    expect((await store.runsForDomain('example.com', 1)).map((r) => r.id)).toEqual([third]);
    expect((await store.recentRuns(10)).map((r) => r.id)).toEqual([third, first]);
    await expect(store.recentRuns(0)).resolves.toEqual([]);
  });

  test('an unreachable server degrades to no-ops', async () => {
    const store = new RedisScanStore({ client: async () => null });
    await expect(store.startRun('example.com')).resolves.toBeNull();
    await expect(store.upsertEntries('example.com', [entry('a.example.com')], 1)).resolves.toBeUndefined();
    await expect(store.completeRun(1, 1, 1)).resolves.toBeUndefined();
    await expect(store.loadSnapshot('example.com')).resolves.toEqual({ entries: [], meta: null });
    await expect(store.runsForDomain('example.com', 5)).resolves.toEqual([]);
  });

  test('command failures surface as StoreError', async () => {
    const redis = new FakeRedis();
    redis.incr = async () => {
      throw new Error('connection reset');
    };
    const store = new RedisScanStore({ client: async () => redis });
    await expect(store.startRun('example.com')).rejects.toBeInstanceOf(StoreError);
    await expect(store.startRun('example.com')).rejects.toThrow('store startRun failed: connection reset');
  });
});

describe('NullScanStore / createScanStore', () => {
  test('the null store keeps nothing', async () => {
    const store = new NullScanStore();
    await store.upsertEntries();
    await expect(store.startRun()).resolves.toBeNull();
    await expect(store.loadSnapshot()).resolves.toEqual({ entries: [], meta: null });
    await expect(store.recentRuns()).resolves.toEqual([]);
  });

  test('history needs both the flag and a redis url', () => {
    const history = { ENABLED: true, RECENT_LIMIT: 50, PER_DOMAIN_LIMIT: 10 };
    expect(createScanStore({ HISTORY: history, REDIS_URL: null, CACHE_KEY_PREFIX: 'v1:' })).toBeInstanceOf(NullScanStore);
    expect(
      createScanStore({ HISTORY: { ...history, ENABLED: false }, REDIS_URL: 'redis://localhost:6379', CACHE_KEY_PREFIX: 'v1:' }),
    ).toBeInstanceOf(NullScanStore);
    const store = createScanStore({ HISTORY: history, REDIS_URL: 'redis://localhost:6379', CACHE_KEY_PREFIX: 'v1:' });
    expect(store).toBeInstanceOf(RedisScanStore);
    expect(store.enabled).toBe(true);
  });
});
