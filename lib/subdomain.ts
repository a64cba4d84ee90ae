import { toASCII } from 'tr46';

const MAX_HOSTNAME_LENGTH = 253;
const LABEL_PATTERN = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/;

/**
 * Canonicalize a raw hostname: strip one leading wildcard label, trim
 * whitespace and dots, lowercase, IDNA (UTS#46, non-transitional, STD3 rules)
 * to ASCII, then validate every label (1-63 chars, no leading/trailing
 * hyphen, <= 253 chars overall). No URL host parsing: numeric labels stay
 * as written and `%` is rejected. Returns null instead of throwing.
 */
export function normalizeHostname(raw: string): string | null {
  if (!raw || typeof raw !== 'string') return null;
  let s = raw.trim();
  if (s.startsWith('*.')) s = s.slice(2);
  s = s.replace(/^[\s.]+|[\s.]+$/g, '');
  if (!s || /[\s\0]/.test(s)) return null;

  const ascii = toASCII(s.toLowerCase(), {
    checkHyphens: false,
    checkBidi: true,
    checkJoiners: true,
    useSTD3ASCIIRules: true,
    transitionalProcessing: false,
    verifyDNSLength: false,
  });
  if (!ascii || ascii.length > MAX_HOSTNAME_LENGTH) return null;
  if (!ascii.split('.').every((label) => LABEL_PATTERN.test(label))) return null;
  return ascii;
}

/** Orders hostnames by code unit, the order snapshots are stored and replayed in. */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Like `normalizeHostname` but also rejects single-label names ("localhost"). */
export function sanitizeDomain(raw: string): string | null {
  const normalized = normalizeHostname(raw);
  if (!normalized || !normalized.includes('.')) return null;
  return normalized;
}

export function isSubdomain(candidate: string, root: string): boolean {
  const c = candidate.replace(/\.+$/, '').toLowerCase();
  const r = root.replace(/\.+$/, '').toLowerCase();
  return c === r || c.endsWith(`.${r}`);
}

/**
 * Split a crt.sh `name_value` field: one name per line, blank lines dropped,
 * one leading wildcard label removed. Case is preserved.
 */
export function splitCrtShNames(value: string): string[] {
  const out: string[] = [];
  for (const token of value.split(/\r?\n/)) {
    let cleaned = token.trim();
    if (!cleaned) continue;
    if (cleaned.startsWith('*.')) cleaned = cleaned.slice(2);
    out.push(cleaned);
  }
  return out;
}

/** Deduplicate keeping the first occurrence of every item. */
export function uniqueEverSeen<T>(items: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const item of items) {
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

export function chunked<T>(items: readonly T[], size: number): T[][] {
  const step = size > 0 ? Math.floor(size) : 1;
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    out.push(items.slice(i, i + step));
  }
  return out;
}
