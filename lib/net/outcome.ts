/**
 * Result of a best-effort upstream operation. `no-answer` is an expected
 * absence (NXDOMAIN, NODATA, no HTTP status); `timeout` and `error` are faults.
 */
export type FailureReason = 'no-answer' | 'timeout' | 'error';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; error?: unknown };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(reason: FailureReason, error?: unknown): Outcome<T> {
  return { ok: false, reason, error };
}

export function valueOr<T>(outcome: Outcome<T>, fallback: T): T {
  return outcome.ok ? outcome.value : fallback;
}

const NO_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NXDOMAIN', 'ENONAME']);
const TIMEOUT_CODES = new Set(['ETIMEOUT', 'ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Classify a thrown DNS/network error. */
export function classifyError(err: unknown): FailureReason {
  if (err instanceof Error) {
    if (err.name === 'AbortError' || err.name === 'TimeoutError' || err.message === 'timeout') return 'timeout';
    const code = errorCode(err) ?? errorCode(err.cause);
    if (code && NO_ANSWER_CODES.has(code)) return 'no-answer';
    if (code && TIMEOUT_CODES.has(code)) return 'timeout';
  }
  return 'error';
}

export async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return success(await fn());
  } catch (err) {
    return failure<T>(classifyError(err), err);
  }
}
