import type { DnsClient } from '../lib/dns';
import { loadConfig, type AppConfig } from '../lib/config';
import { SlidingWindowRateLimiter } from '../lib/limits';
import type { FetchFn } from '../lib/net/fetchWithRetry';
import { ScanPipeline, type PipelineDeps } from '../lib/pipeline';
import { LivenessProber } from '../lib/probe';
import type { ResolverBackend } from '../lib/resolver/types';
import { RedisScanStore } from '../lib/store';
import type { ResolvedRecord } from '../lib/types';
import { createApp } from '../app/server';
import type { Services } from '../app/services';
import { FakeRedis } from './helpers/fakeRedis';

const NOW = new Date('2024-03-01T10:00:00.000Z');

function noData(): Error {
  return Object.assign(new Error('queryA ENODATA'), { code: 'ENODATA' });
}

const zone: DnsClient = {
  resolve4: async (host) => {
    if (host === 'www.example.com') return ['192.0.2.10'];
    throw noData();
  },
  resolve6: async () => {
    throw noData();
  },
  resolveCname: async () => {
    throw noData();
  },
};

const fetchImpl: FetchFn = async (input, init) => {
  if (`${init?.method} ${String(input)}` === 'HEAD https://www.example.com') {
    return new Response(null, { status: 200, headers: { Server: 'nginx' } });
  }
  throw new TypeError('fetch failed');
};

const stubProber: PipelineDeps['prober'] = {
  probe: async (name, known = {}) => ({
    name,
    ips: known.ips ?? [],
    cname: known.cname ?? null,
    httpStatus: 200,
    tls: true,
    server: 'fresh',
    lastProbe: NOW.toISOString(),
  }),
};

function backendOf(records: ResolvedRecord[], failure?: Error): ResolverBackend {
  return {
    name: 'dns',
    async *resolve() {
      yield* records;
      if (failure) throw failure;
    },
  };
}

function testConfig(): AppConfig {
  const base = loadConfig();
  return {
    ...base,
    RATE_LIMIT: { ...base.RATE_LIMIT, REQUESTS: 2, WINDOW_MS: 60_000 },
    HISTORY: { ...base.HISTORY, RECENT_LIMIT: 3 },
  };
}

function setup(opts: { backend?: ResolverBackend; limiter?: SlidingWindowRateLimiter } = {}) {
  const config = testConfig();
  const redis = new FakeRedis();
  const store = new RedisScanStore({ prefix: 't:', client: async () => redis, now: () => NOW });
  const ticks = [100, 140];
  const pipeline = new ScanPipeline({
    store,
    collector: { collect: async () => ['www.example.org'] },
    selectBackend: async () => opts.backend ?? backendOf([]),
    prober: stubProber,
    now: () => NOW,
    clock: () => ticks.shift() ?? 0,
  });
  const prober = new LivenessProber({ fetchImpl, tlsCheck: async () => false, dnsClient: zone, now: () => NOW });
  const services: Services = {
    config,
    store,
    pipeline,
    prober,
    limiter: opts.limiter ?? null,
    locateMassdns: async () => null,
  };
  return { app: createApp(services), store };
}

async function seedHistory(store: RedisScanStore): Promise<void> {
  const runId = await store.startRun('example.com');
  await store.upsertEntries(
    'example.com',
    [
      {
        name: 'www.example.com',
        ips: ['192.0.2.10'],
        cname: null,
        httpStatus: 301,
        tls: true,
        server: 'nginx',
        lastProbe: NOW.toISOString(),
      },
    ],
    runId,
  );
  await store.completeRun(runId, 1, 1200);
}

const RUN_PAYLOAD = {
  id: 1,
  domain: 'example.com',
  timestamp: '2024-03-01T10:00:00.000Z',
  total: 1,
  duration_ms: 1200,
};

describe('service info', () => {
  test('GET / describes the service', async () => {
    const { app } = setup();
    const res = await app.request('/');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: 'subdomain-radar',
      version: '0.1.0',
      status: 'ok',
      features: { history_enabled: true, massdns_available: false },
      rate_limit: { requests: 2, window_seconds: 60 },
    });
  });

  test('GET /healthz answers with CORS headers', async () => {
    const { app } = setup();
    const res = await app.request('/healthz');
    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    const body: unknown = await res.json();
    expect(body).toMatchObject({ status: 'ok' });
  });

  test('GET /metrics exposes the prometheus registry', async () => {
    const { app } = setup();
    const res = await app.request('/metrics');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(await res.text()).toContain('# TYPE subdomain_radar_scans_total counter');
  });

  test('unknown paths are 404 json', async () => {
    const { app } = setup();
    const res = await app.request('/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'not found' });
  });
});

describe('GET /api/status', () => {
  test('probes a single host', async () => {
    const { app } = setup();
    const res = await app.request('/api/status?domain=WWW.Example.com');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: 'www.example.com',
      ips: ['192.0.2.10'],
      cname: null,
      http_status: 200,
      tls: true,
      server: 'nginx',
      last_probe: '2024-03-01T10:00:00.000Z',
    });
  });

  test('rejects an invalid domain', async () => {
    const { app } = setup();
    const res = await app.request('/api/status?domain=not%20a%20domain');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'invalid domain' });
  });
});

describe('history routes', () => {
  test('GET /api/history returns the snapshot and runs', async () => {
    const { app, store } = setup();
    await seedHistory(store);

    const res = await app.request('/api/history?domain=example.com');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      domain: 'example.com',
      cached: '2024-03-01T10:00:00.000Z',
      total: 1,
      results: [
        { name: 'www.example.com', ips: ['192.0.2.10'], cname: null, http_status: 301, tls: true, server: 'nginx' },
      ],
      runs: [RUN_PAYLOAD],
    });
  });

  test('GET /api/history for an unknown domain is empty', async () => {
    const { app } = setup();
    const res = await app.request('/api/history?domain=example.net');
    expect(await res.json()).toEqual({ domain: 'example.net', cached: null, total: 0, results: [], runs: [] });
  });

  test('GET /api/recent lists completed runs', async () => {
    const { app, store } = setup();
    await seedHistory(store);
    const res = await app.request('/api/recent');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ recent: [RUN_PAYLOAD] });
  });

  test('GET /api/recent defaults to 10 and clamps to the configured limit', async () => {
    const { app, store } = setup();
    const recentRuns = jest.spyOn(store, 'recentRuns');

    await app.request('/api/recent');
    await app.request('/api/recent?limit=2');
    await app.request('/api/recent?limit=100');
    expect(recentRuns.mock.calls).toEqual([[3], [2], [3]]);
  });

  test.each(['0', '101', 'abc', '2.5'])('GET /api/recent rejects limit=%s', async (limit) => {
    const { app } = setup();
    const res = await app.request(`/api/recent?limit=${limit}`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'limit must be an integer between 1 and 100' });
  });
});

describe('GET /api/search', () => {
  test('rejects an invalid domain before streaming', async () => {
    const { app } = setup();
    const res = await app.request('/api/search?domain=localhost');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'invalid domain' });
  });

  test('streams the discovery pass as server-sent events', async () => {
    const { app } = setup({ backend: backendOf([{ name: 'www.example.org', ips: ['198.51.100.7'], cname: null }]) });
    const res = await app.request('/api/search?domain=example.org');
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/event-stream/);
    expect(res.headers.get('x-accel-buffering')).toBe('no');
    expect(res.headers.get('cache-control')).toBe('no-cache');

    const frames = (await res.text()).split('\n\n').filter(Boolean);
    expect(frames).toEqual([
      'data: {"stage":"started","domain":"example.org"}',
      'data: {"stage":"crt_sh_found","domain":"example.org","count":1}',
      'data: {"stage":"resolving","domain":"example.org","resolver":"dns","count":1}',
      'data: {"type":"entry","name":"www.example.org","ips":["198.51.100.7"],"cname":null,"http_status":200,"tls":true,"server":"fresh"}',
      'data: {"stage":"done","domain":"example.org","total_unique":1,"cached_at":"2024-03-01T10:00:00.000Z","duration_ms":40}',
    ]);
  });

  test('a failed pass ends with a named error event', async () => {
    const { app } = setup({ backend: backendOf([], new Error('resolver offline')) });
    const res = await app.request('/api/search?domain=example.org');
    const frames = (await res.text()).split('\n\n').filter(Boolean);
    expect(frames[frames.length - 1]).toBe(
      'event: error\ndata: {"stage":"error","domain":"example.org","error":"resolver offline"}',
    );
  });
});

describe('rate limiting', () => {
  test('admits up to the quota then answers 429 with Retry-After', async () => {
    const limiter = new SlidingWindowRateLimiter({ requests: 2, windowMs: 60_000, now: () => 0 });
    const { app } = setup({ limiter });

    const first = await app.request('/api/recent');
    expect(first.status).toBe(200);
    expect(first.headers.get('x-ratelimit-remaining')).toBe('1');
    expect(first.headers.get('x-ratelimit-reset')).toBe('60');

    const second = await app.request('/api/recent');
    expect(second.headers.get('x-ratelimit-remaining')).toBe('0');

    const third = await app.request('/api/recent');
    expect(third.status).toBe(429);
    expect(third.headers.get('retry-after')).toBe('60');
    expect(await third.json()).toEqual({ error: 'rate limit exceeded', retry_after: 60 });
  });

  test('only the api is limited', async () => {
    const limiter = new SlidingWindowRateLimiter({ requests: 1, windowMs: 60_000, now: () => 0 });
    const { app } = setup({ limiter });
    await app.request('/api/recent');
    expect((await app.request('/api/recent')).status).toBe(429);
    expect((await app.request('/healthz')).status).toBe(200);
  });
});
