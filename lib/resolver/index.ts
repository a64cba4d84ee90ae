import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import path from 'path';
import { CONFIG, type AppConfig } from '../config';
import { moduleLogger } from '../logger';
import { DnsResolverBackend, type DnsBackendOptions } from './dnsBackend';
import { MassdnsResolverBackend, type BatchRunner } from './massdns';
import type { ResolverBackend } from './types';

export type { ResolverBackend } from './types';
export { DnsResolverBackend } from './dnsBackend';
export { MassdnsResolverBackend, parseMassdnsOutput, spawnBatch } from './massdns';

const logger = moduleLogger('resolver');

const DEFAULT_MASSDNS_PATH = '/opt/massdns/massdns';

async function isExecutable(file: string): Promise<boolean> {
  try {
    await access(file, constants.X_OK);
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find an executable massdns: the configured path, then the conventional
 * install location, then every directory on PATH.
 */
export async function locateMassdns(
  configured: string | null = CONFIG.MASSDNS.BIN,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | null> {
  const candidates = [
    ...(configured ? [configured] : []),
    DEFAULT_MASSDNS_PATH,
    ...searchPath.split(path.delimiter).filter(Boolean).map((dir) => path.join(dir, 'massdns')),
  ];
  for (const candidate of candidates) {
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

/**
 * Configured resolver list (relative to cwd), else the copy shipped at the
 * repo root, found from both the sources and the compiled dist/ tree.
 */
export async function resolversPath(configured: string = CONFIG.MASSDNS.RESOLVERS_FILE): Promise<string> {
  const primary = path.resolve(configured);
  const candidates = [
    primary,
    path.resolve(__dirname, '..', '..', 'resolvers.txt'),
    path.resolve(__dirname, '..', '..', '..', 'resolvers.txt'),
  ];
  for (const candidate of candidates) {
    try {
      await access(candidate, constants.R_OK);
      return candidate;
    } catch (err) {
      logger.trace({ candidate, err }, 'resolver list not readable');
    }
  }
  return primary;
}

export interface ResolverSelectionOptions {
  massdns?: AppConfig['MASSDNS'];
  dns?: DnsBackendOptions;
  locate?: () => Promise<string | null>;
  runner?: BatchRunner;
}

/**
 * Chooses the resolver for one pass. massdns when an executable is found,
 * otherwise per-host DNS; chosen fresh each pass.
 */
export async function selectResolverBackend(opts: ResolverSelectionOptions = {}): Promise<ResolverBackend> {
  const massdns = opts.massdns ?? CONFIG.MASSDNS;
  const dns = new DnsResolverBackend(opts.dns);
  const bin = await (opts.locate ?? (() => locateMassdns(massdns.BIN)))();
  if (!bin) {
    logger.debug('massdns not found, using per-host dns');
    return dns;
  }
  return new MassdnsResolverBackend({
    bin,
    resolversFile: await resolversPath(massdns.RESOLVERS_FILE),
    fallback: dns,
    batchSize: massdns.BATCH_SIZE,
    timeoutMs: massdns.TIMEOUT_MS,
    runner: opts.runner,
  });
}
