import type { CycleResult, FlushMode, TransferSource, WatchList } from './types.js';
import { PersistError, toError } from './errors.js';
import { logger } from './logger.js';
import type { NotificationSink } from './sinks/types.js';
import type { StateStore } from './store/stateStore.js';
import { runWatchCycle, type RetryPolicy } from './watcher/cycle.js';
import type { RequestLimiter } from './watcher/limiter.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PERSIST_FAILED = 2;

export interface RunOnceOptions {
  addresses: WatchList;
  store: StateStore;
  source: TransferSource;
  sink: NotificationSink;
  flush: FlushMode;
  limiter?: RequestLimiter;
  retry?: RetryPolicy;
  signal?: AbortSignal;
}

export interface RunOnceOutcome {
  result: CycleResult;
  exitCode: number;
}

/**
 * load -> cycle -> save.
 *
 * CorruptStateError from load propagates before any address is fetched.
 * Fetch failures never fail the run; only a ledger that could not be written does.
 */
export async function runOnce(options: RunOnceOptions): Promise<RunOnceOutcome> {
  const { addresses, store, flush } = options;

  const initial = await store.load();
  logger.info({ addresses: addresses.length, known: initial.size, flush }, 'Starting cycle');

  const result = await runWatchCycle(addresses, initial, {
    source: options.source,
    sink: options.sink,
    limiter: options.limiter,
    retry: options.retry,
    signal: options.signal,
    store,
    flush,
  });

  if (result.persistError) {
    return { result, exitCode: EXIT_PERSIST_FAILED };
  }

  // Per-address mode has already flushed every change; end mode (and a
  // ledger file that does not exist yet) still needs the final write.
  if (flush === 'end' || result.events.length === 0) {
    try {
      await store.save(result.ledger);
    } catch (error) {
      const persistError =
        error instanceof PersistError
          ? error
          : new PersistError('(store)', toError(error).message, toError(error));
      logger.error({ error: persistError.message }, 'Failed to save ledger');
      return { result: { ...result, persistError }, exitCode: EXIT_PERSIST_FAILED };
    }
  }

  logger.info(
    {
      changed: result.events.length,
      empty: result.empty.length,
      failed: result.failures.length,
      interrupted: result.interrupted,
    },
    'Cycle complete'
  );

  return { result, exitCode: EXIT_OK };
}
