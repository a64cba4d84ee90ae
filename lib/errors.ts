/**
 * Error taxonomy. Upstream source failures (crt.sh, DNS, probes, massdns)
 * are not errors here: they travel as `Outcome` values and degrade locally.
 */

export class InvalidDomainError extends Error {
  constructor(public readonly input: string) {
    super('invalid domain');
    this.name = 'InvalidDomainError';
  }
}

export class RateLimitExceeded extends Error {
  constructor(public readonly retryAfterMs: number) {
    super('rate limit exceeded');
    this.name = 'RateLimitExceeded';
  }

  get retryAfterSeconds(): number {
    return Math.max(0, Math.ceil(this.retryAfterMs / 1000));
  }

  headers(): Record<string, string> {
    return { 'Retry-After': String(this.retryAfterSeconds) };
  }
}

export class StoreError extends Error {
  constructor(public readonly operation: string, cause: unknown) {
    super(`store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'StoreError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
