export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super('timeout');
    this.name = 'TimeoutError';
  }
}

/**
 * Shared timeout helper for promises. The underlying work is not cancelled.
 */
export function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new TimeoutError(ms)), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}

export function delayMs(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}
