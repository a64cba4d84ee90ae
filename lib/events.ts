import type { EntryPayload, ScanEvent, ScanRunSummary, SubdomainEntry } from './types';

export function toEntryPayload(entry: SubdomainEntry): EntryPayload {
  return {
    name: entry.name,
    ips: entry.ips,
    cname: entry.cname,
    http_status: entry.httpStatus,
    tls: entry.tls,
    server: entry.server,
  };
}

export function entryEvent(entry: SubdomainEntry): ScanEvent {
  return { type: 'entry', ...toEntryPayload(entry) };
}

/** Single-host probe response: the entry plus when it was taken. */
export function toProbePayload(entry: SubdomainEntry): EntryPayload & { last_probe: string } {
  return { ...toEntryPayload(entry), last_probe: entry.lastProbe };
}

export function toRunPayload(run: ScanRunSummary) {
  return {
    id: run.id,
    domain: run.domain,
    timestamp: run.timestamp,
    total: run.total,
    duration_ms: run.durationMs,
  };
}

/** Server-sent-event message; `error` events carry an explicit event name. */
export function toSseMessage(event: ScanEvent): { data: string; event?: string } {
  const data = JSON.stringify(event);
  if ('stage' in event && event.stage === 'error') return { event: 'error', data };
  return { data };
}
