import type { HttpBindings } from '@hono/node-server';
import { CONFIG, type AppConfig } from '../lib/config';
import { CandidateCollector } from '../lib/collector';
import { SlidingWindowRateLimiter } from '../lib/limits';
import { ScanPipeline } from '../lib/pipeline';
import { LivenessProber } from '../lib/probe';
import { locateMassdns, selectResolverBackend } from '../lib/resolver';
import { createScanStore, type ScanStore } from '../lib/store';

export interface Services {
  config: AppConfig;
  store: ScanStore;
  pipeline: ScanPipeline;
  prober: LivenessProber;
  /** null when rate limiting is disabled (RATE_LIMIT_REQUESTS=0). */
  limiter: SlidingWindowRateLimiter | null;
  locateMassdns: () => Promise<string | null>;
}

export type AppEnv = {
  Bindings: HttpBindings;
  Variables: { services: Services };
};

/** Builds every long-lived collaborator once, from configuration. */
export function createServices(config: AppConfig = CONFIG): Services {
  const store = createScanStore(config);
  const prober = new LivenessProber({ timeoutMs: config.HTTP_TIMEOUT_MS });
  const collector = new CandidateCollector({ bruteforce: config.BRUTEFORCE });
  const locate = () => locateMassdns(config.MASSDNS.BIN);
  const pipeline = new ScanPipeline({
    store,
    collector,
    prober,
    selectBackend: () =>
      selectResolverBackend({
        massdns: config.MASSDNS,
        dns: { concurrency: config.CONCURRENCY.RESOLVER, timeoutMs: config.DNS_TIMEOUT_MS },
        locate,
      }),
    probeConcurrency: config.CONCURRENCY.PROBE,
    streamBuffer: config.STREAM_BUFFER,
  });
  const limiter =
    config.RATE_LIMIT.REQUESTS > 0
      ? new SlidingWindowRateLimiter({
          requests: config.RATE_LIMIT.REQUESTS,
          windowMs: config.RATE_LIMIT.WINDOW_MS,
          maxKeys: config.RATE_LIMIT.MAX_KEYS,
          trustForwardedFor: config.RATE_LIMIT.TRUST_X_FORWARDED_FOR,
        })
      : null;
  return { config, store, pipeline, prober, limiter, locateMassdns: locate };
}
