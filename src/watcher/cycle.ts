import type { Logger } from 'pino';
import type {
  ChangeEvent,
  CycleFailure,
  CycleResult,
  FlushMode,
  LatestTransfer,
  StateLedger,
  TransferSource,
  WatchList,
} from '../types.js';
import { FetchError, NotifyError, PersistError, toError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { NotificationSink } from '../sinks/types.js';
import type { StateStore } from '../store/stateStore.js';
import { upsert } from '../store/ledger.js';
import { SequentialLimiter, sleep, type RequestLimiter } from './limiter.js';

export interface RetryPolicy {
  /** Extra attempts after a rate-limit rejection */
  retries: number;
  baseDelayMs: number;
}

export interface CycleOptions {
  source: TransferSource;
  sink: NotificationSink;
  limiter?: RequestLimiter;
  /** Enables incremental flushing when `flush` is 'per-address' */
  store?: StateStore;
  flush?: FlushMode;
  retry?: RetryPolicy;
  signal?: AbortSignal;
  logger?: Logger;
}

const NO_RETRY: RetryPolicy = { retries: 0, baseDelayMs: 0 };

/**
 * Fetch through the limiter, retrying rate-limit rejections with exponential backoff.
 * Anything a source throws comes out as a FetchError.
 */
async function fetchLatest(
  address: string,
  source: TransferSource,
  limiter: RequestLimiter,
  retry: RetryPolicy,
  log: Logger
): Promise<LatestTransfer | null> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await limiter.schedule(() => source.getLatestTransfer(address));
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(address, 'unknown', toError(error).message, undefined, toError(error));

      if (fetchError.kind !== 'rate-limit' || attempt >= retry.retries) {
        throw fetchError;
      }

      const delay = retry.baseDelayMs * 2 ** attempt;
      log.warn({ address, attempt: attempt + 1, delayMs: delay }, 'Rate limited, retrying');
      await sleep(delay);
    }
  }
}

/**
 * One polling pass over `addresses`.
 *
 * Addresses are fetched one at a time in order. A new or changed hash is sent to
 * the sink and then recorded in the ledger; unchanged hashes, empty accounts and
 * failed fetches leave the ledger alone. The input ledger is never mutated.
 *
 * With a store and `flush: 'per-address'`, the ledger is saved after every change
 * and a PersistError ends the pass early (returned as `persistError`).
 */
export async function runWatchCycle(
  addresses: WatchList,
  initial: StateLedger,
  options: CycleOptions
): Promise<CycleResult> {
  const {
    source,
    sink,
    store,
    signal,
    flush = 'end',
    retry = NO_RETRY,
    limiter = new SequentialLimiter(),
    logger: log = defaultLogger,
  } = options;

  let ledger = initial;
  const events: ChangeEvent[] = [];
  const failures: CycleFailure[] = [];
  const empty: string[] = [];
  const processed: string[] = [];
  let interrupted = false;
  let persistError: PersistError | undefined;

  for (const address of addresses) {
    if (signal?.aborted) {
      interrupted = true;
      log.warn({ remaining: addresses.length - processed.length }, 'Cycle interrupted');
      break;
    }

    processed.push(address);

    let latest: LatestTransfer | null;
    try {
      latest = await fetchLatest(address, source, limiter, retry, log);
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(address, 'unknown', toError(error).message);
      failures.push({ address, error: fetchError });
      log.warn(
        { address, kind: fetchError.kind, status: fetchError.status, error: fetchError.message },
        'Failed to fetch latest transfer'
      );
      continue;
    }

    if (latest === null) {
      empty.push(address);
      log.info({ address }, 'No transactions');
      continue;
    }

    const previous = ledger.get(address);
    if (previous?.hash === latest.hash) {
      log.debug({ address, hash: latest.hash }, 'No change');
      continue;
    }

    const event: ChangeEvent = {
      address,
      previousHash: previous?.hash,
      newHash: latest.hash,
      timestamp: latest.timestamp,
    };

    try {
      await sink.send(event);
    } catch (error) {
      const cause = toError(error);
      failures.push({ address, error: new NotifyError(address, cause.message, cause) });
      log.warn({ address, sink: sink.kind, error: cause.message }, 'Failed to deliver change event');
      continue;
    }

    events.push(event);
    ledger = upsert(ledger, address, latest.hash, latest.timestamp);
    log.info(
      { address, previousHash: event.previousHash ?? null, hash: event.newHash },
      'New transaction detected'
    );

    if (store && flush === 'per-address') {
      try {
        await store.save(ledger);
      } catch (error) {
        persistError =
          error instanceof PersistError
            ? error
            : new PersistError('(store)', toError(error).message, toError(error));
        log.error({ address, error: persistError.message }, 'Failed to flush ledger, stopping cycle');
        break;
      }
    }
  }

  return { ledger, events, failures, empty, processed, interrupted, persistError };
}
