#!/usr/bin/env node
import { initConfig } from './config.js';
import { logger } from './logger.js';
import { createExplorerClient, createRequestLimiter } from './clients.js';
import { parseCliArgs } from './cli/parser.js';
import { printBanner, printError, printSummary } from './cli/formatter.js';
import { ConsoleSink, JsonLinesSink, type NotificationSink } from './sinks/index.js';
import { FileStateStore, MemoryStateStore, type StateStore } from './store/stateStore.js';
import { readWatchList } from './utils/watchlist.js';
import { EXIT_FATAL, runOnce } from './runner.js';
import { toError } from './errors.js';

const abortController = new AbortController();

/**
 * Stop between addresses; whatever was processed is still saved
 */
function requestStop(signal: string): void {
  if (abortController.signal.aborted) {
    logger.warn({ signal }, 'Second signal received, exiting immediately');
    process.exit(EXIT_FATAL);
  }
  logger.info({ signal }, 'Shutdown signal received, finishing current address...');
  abortController.abort();
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
  // Parse CLI arguments
  const cliOptions = parseCliArgs();

  // Initialize config with CLI overrides
  const config = initConfig({
    watchlistPath: cliOptions.watchlist,
    ledgerPath: cliOptions.ledger,
    flushMode: cliOptions.flush,
  });
  logger.level = config.logLevel;

  const addresses = await readWatchList(config.watchlistPath);

  if (!cliOptions.json) {
    printBanner({
      apiUrl: config.apiUrl,
      addressCount: addresses.length,
      ledgerPath: config.ledgerPath,
      flushMode: config.flushMode,
      dryRun: cliOptions.dryRun,
    });
  }

  process.on('SIGINT', () => requestStop('SIGINT'));
  process.on('SIGTERM', () => requestStop('SIGTERM'));

  const fileStore = new FileStateStore(config.ledgerPath);
  const store: StateStore = cliOptions.dryRun
    ? new MemoryStateStore(await fileStore.load())
    : fileStore;
  const sink: NotificationSink = cliOptions.json ? new JsonLinesSink() : new ConsoleSink();

  const { result, exitCode } = await runOnce({
    addresses,
    store,
    source: createExplorerClient(config),
    sink,
    flush: config.flushMode,
    limiter: createRequestLimiter(config),
    retry: { retries: config.rateLimitRetries, baseDelayMs: config.retryBaseDelayMs },
    signal: abortController.signal,
  });

  if (!cliOptions.json) {
    printSummary(result);
  }

  if (result.persistError) {
    printError('Ledger could not be written; these changes will be reported again', result.persistError);
  }

  return exitCode;
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    const err = toError(error);
    logger.error({ error: err.message }, 'Fatal error in main');
    printError('Fatal error', err);
    process.exitCode = EXIT_FATAL;
  }
);
