import type { Logger } from 'pino';
import { PersistenceBusyError } from '../../domain/index.js';
import { sleep as defaultSleep, type SleepFn } from '../../application/backoff.js';

export interface BusyRetryOptions {
  /** Retries after the first failed try. */
  retries: number;
  delayMs: number;
  sleep?: SleepFn;
}

export const DEFAULT_BUSY_RETRY: BusyRetryOptions = { retries: 3, delayMs: 50 };

/** SQLITE_BUSY / SQLITE_LOCKED, including their extended codes. */
export function isBusyError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const code = err.code;
  return typeof code === 'string'
    && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/**
 * Runs a store operation, retrying a few times on lock contention.
 *
 * Non-busy errors are rethrown as-is. When the store is still locked after
 * the last retry the failure surfaces as PersistenceBusyError, which callers
 * treat as "not recorded yet".
 */
export async function withBusyRetry<T>(
  operation: string,
  fn: () => T,
  log: Logger,
  options: BusyRetryOptions = DEFAULT_BUSY_RETRY,
): Promise<T> {
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (!isBusyError(err)) throw err;

      if (attempt >= options.retries) {
        throw new PersistenceBusyError(
          `Store still busy after ${attempt + 1} tries (${operation})`,
          { cause: err },
        );
      }

      log.debug({ operation, attempt: attempt + 1 }, 'Store busy, retrying');
      await wait(options.delayMs);
    }
  }
}
