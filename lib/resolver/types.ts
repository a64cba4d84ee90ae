import type { ResolvedRecord, ResolverName } from '../types';

/**
 * A resolution strategy. Implementations yield only records with at least one
 * address or a CNAME, in whatever order they complete.
 */
export interface ResolverBackend {
  readonly name: ResolverName;
  resolve(candidates: readonly string[]): AsyncIterable<ResolvedRecord>;
}
