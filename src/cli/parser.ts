import { Command, InvalidArgumentError } from 'commander';
import type { FlushMode } from '../types.js';
import { flushModeSchema } from '../config.js';

export interface CLIOptions {
  watchlist?: string;
  ledger?: string;
  flush?: FlushMode;
  json: boolean;
  dryRun: boolean;
}

function parseFlushMode(value: string): FlushMode {
  const result = flushModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('Expected "per-address" or "end".');
  }
  return result.data;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(argv: readonly string[] = process.argv): CLIOptions {
  const program = new Command();

  program
    .name('txwatch')
    .description('Report new token transfers for a watched set of addresses (one pass per run)')
    .version('1.0.0')
    .option('-w, --watchlist <path>', 'Watch list file, one address per line')
    .option('-l, --ledger <path>', 'Ledger file holding the last seen transaction per address')
    .option('-f, --flush <mode>', 'When to write the ledger: per-address | end', parseFlushMode)
    .option('--json', 'Print change events as JSON lines', false)
    .option('-n, --dry-run', 'Fetch and report without writing the ledger', false)
    .parse([...argv]);

  const options = program.opts<CLIOptions>();

  return {
    watchlist: options.watchlist,
    ledger: options.ledger,
    flush: options.flush,
    json: options.json,
    dryRun: options.dryRun,
  };
}
