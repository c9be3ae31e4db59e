import { setTimeout as delay } from 'node:timers/promises';

// Float noise guard: 114.99999999999999 must ceil to 115.00, not 115.01
const CENT_EPSILON = 1e-6;

export const roundToCents = (value: number): number => Math.round(value * 100) / 100;

export const floorToCents = (value: number): number =>
  Math.floor(value * 100 + CENT_EPSILON) / 100;

export const ceilToCents = (value: number): number => Math.ceil(value * 100 - CENT_EPSILON) / 100;

export function calcPnl(entryPrice: number, price: number, quantity: number): number {
  return roundToCents((price - entryPrice) * quantity);
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} aborted`);
    this.name = 'AbortedError';
  }
}

/**
 * Races `promise` against a timer. The underlying call is not cancelled; only
 * the caller stops waiting. An aborted `signal` rejects with AbortedError.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError(label));
      return;
    }

    const onAbort = () => {
      cleanup();
      reject(new AbortedError(label));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(label, ms));
    }, ms);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/** Resolves after `ms`, or early (without throwing) when `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(Math.max(0, ms), undefined, { signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') return;
    throw err;
  }
}
