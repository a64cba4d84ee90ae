/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `subdomain_radar_requests_total` (Counter)
 * - `subdomain_radar_rate_limited_total` (Counter)
 * - `subdomain_radar_scans_total{outcome}` (Counter): cache_hit, completed or failed
 * - `subdomain_radar_probe_duration_seconds` (Histogram)
 * - `subdomain_radar_resolve_failures_total{reason}` (Counter)
 *
 * Expose `register.metrics()` via an HTTP endpoint for Prometheus scraping.
 */

import { Counter, Histogram, register } from 'prom-client';
import type { FailureReason } from './net/outcome';

export type ScanOutcome = 'cache_hit' | 'completed' | 'failed';

export const requestsTotal = new Counter({
  name: 'subdomain_radar_requests_total',
  help: 'Total number of API requests admitted or rejected by the rate limiter',
});

export const rateLimitedTotal = new Counter({
  name: 'subdomain_radar_rate_limited_total',
  help: 'Total number of requests that were rate limited',
});

export const scansTotal = new Counter({
  name: 'subdomain_radar_scans_total',
  help: 'Discovery passes by outcome',
  labelNames: ['outcome'] as const,
});

export const resolveFailuresTotal = new Counter({
  name: 'subdomain_radar_resolve_failures_total',
  help: 'DNS record lookups that produced no records, by reason',
  labelNames: ['reason'] as const,
});

export const probeDuration = new Histogram({
  name: 'subdomain_radar_probe_duration_seconds',
  help: 'Histogram of liveness probe latency in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 20],
});

export function incRequests(count = 1): void {
  requestsTotal.inc(count);
}

export function incRateLimited(count = 1): void {
  rateLimitedTotal.inc(count);
}

export function incScan(outcome: ScanOutcome): void {
  scansTotal.inc({ outcome });
}

export function incResolveFailure(reason: FailureReason): void {
  resolveFailuresTotal.inc({ reason });
}

export function observeProbeLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  probeDuration.observe(seconds);
}

export { register };
