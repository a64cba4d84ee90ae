import { spawn } from 'child_process';
import { CONFIG } from '../config';
import { moduleLogger } from '../logger';
import { errorCode } from '../net/outcome';
import { chunked } from '../subdomain';
import type { ResolvedRecord } from '../types';
import type { ResolverBackend } from './types';

const logger = moduleLogger('massdns');

export type BatchRunResult =
  | { kind: 'ok'; stdout: string }
  | { kind: 'failed'; exitCode: number | null; stderr: string }
  | { kind: 'missing' };

export type BatchRunner = (bin: string, args: string[], input: string, timeoutMs: number) => Promise<BatchRunResult>;

/**
 * Spawn one massdns process, feed `input` on stdin and collect stdout.
 * ENOENT (binary gone) is reported as `missing`; a timeout kills the process.
 */
export const spawnBatch: BatchRunner = (bin, args, input, timeoutMs) =>
  new Promise<BatchRunResult>((resolve) => {
    let settled = false;
    const finish = (result: BatchRunResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(bin, args);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish({ kind: 'failed', exitCode: null, stderr: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.stdin.on('error', (err) => logger.debug({ err, bin }, 'massdns stdin closed early'));
    child.on('error', (err) => {
      if (errorCode(err) === 'ENOENT') {
        finish({ kind: 'missing' });
      } else {
        finish({ kind: 'failed', exitCode: null, stderr: err.message });
      }
    });
    child.on('close', (code) => {
      if (code === 0) {
        finish({ kind: 'ok', stdout: Buffer.concat(stdout).toString('utf8') });
      } else {
        finish({ kind: 'failed', exitCode: code, stderr: Buffer.concat(stderr).toString('utf8') });
      }
    });

    child.stdin.end(input);
  });

/**
 * Parse massdns simple output (`-o S`): `<name>. <TYPE> <value>.` per line.
 * A/AAAA add to the address set, CNAME overwrites the canonical name.
 */
export function parseMassdnsOutput(output: string): Map<string, ResolvedRecord> {
  const acc = new Map<string, { ips: Set<string>; cname: string | null }>();
  for (const line of output.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 3) continue;
    const name = parts[0].replace(/\.+$/, '').toLowerCase();
    const type = parts[1].toUpperCase();
    const value = parts[2].replace(/\.+$/, '');
    let entry = acc.get(name);
    if (!entry) {
      entry = { ips: new Set(), cname: null };
      acc.set(name, entry);
    }
    if (type === 'A' || type === 'AAAA') {
      entry.ips.add(value);
    } else if (type === 'CNAME') {
      entry.cname = value.toLowerCase();
    }
  }

  const records = new Map<string, ResolvedRecord>();
  for (const [name, entry] of acc) {
    if (entry.ips.size === 0 && !entry.cname) continue;
    records.set(name, { name, ips: Array.from(entry.ips).sort(), cname: entry.cname });
  }
  return records;
}

export interface MassdnsOptions {
  bin: string;
  resolversFile: string;
  /** Takes over the remaining candidates when the binary disappears. */
  fallback: ResolverBackend;
  batchSize?: number;
  timeoutMs?: number;
  runner?: BatchRunner;
}

/** Batched resolution through an external massdns process, one batch at a time. */
export class MassdnsResolverBackend implements ResolverBackend {
  readonly name = 'massdns' as const;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly runner: BatchRunner;

  constructor(private readonly opts: MassdnsOptions) {
    this.batchSize = opts.batchSize ?? CONFIG.MASSDNS.BATCH_SIZE;
    this.timeoutMs = opts.timeoutMs ?? CONFIG.MASSDNS.TIMEOUT_MS;
    this.runner = opts.runner ?? spawnBatch;
  }

  async *resolve(candidates: readonly string[]): AsyncGenerator<ResolvedRecord> {
    const batches = chunked(candidates, this.batchSize);
    const args = ['-r', this.opts.resolversFile, '-o', 'S', '-w', '-'];
    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];
      if (batch.length === 0) continue;
      const input = batch.map((name) => `${name}.`).join('\n') + '\n';
      const result = await this.runner(this.opts.bin, args, input, this.timeoutMs);

      if (result.kind === 'missing') {
        const remaining = batches.slice(i).flat();
        logger.warn({ bin: this.opts.bin, remaining: remaining.length }, 'massdns binary missing, falling back to per-host resolution');
        yield* this.opts.fallback.resolve(remaining);
        return;
      }
      if (result.kind === 'failed') {
        logger.warn({ exitCode: result.exitCode, stderr: result.stderr.slice(0, 500), batch: i, size: batch.length }, 'massdns batch failed, dropping its results');
        continue;
      }
      // -o S also prints the CNAME targets' own records; keep the queried names only
      const queried = new Set(batch);
      for (const record of parseMassdnsOutput(result.stdout).values()) {
        if (queried.has(record.name)) yield record;
      }
    }
  }
}

export default MassdnsResolverBackend;
