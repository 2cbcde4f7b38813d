import chalk from 'chalk';
import type { CycleResult } from '../types.js';
import { formatTimestamp, shortenAddress, shortenTxHash } from '../utils/formatting.js';

/**
 * Print startup banner with configuration
 */
export function printBanner(config: {
  apiUrl: string;
  addressCount: number;
  ledgerPath: string;
  flushMode: string;
  dryRun: boolean;
}): void {
  console.log();
  console.log(chalk.bold.cyan('╔═══════════════════════════════════════════════╗'));
  console.log(
    chalk.bold.cyan('║') +
      chalk.bold.white('   TOKEN TRANSFER WATCHER                      ') +
      chalk.bold.cyan('║')
  );
  console.log(chalk.bold.cyan('╚═══════════════════════════════════════════════╝'));
  console.log();
  console.log(`${chalk.gray('Explorer:')}        ${chalk.white(config.apiUrl)}`);
  console.log(`${chalk.gray('Addresses:')}       ${chalk.white(config.addressCount)}`);
  console.log(`${chalk.gray('Ledger:')}          ${chalk.white(config.ledgerPath)}`);
  console.log(`${chalk.gray('Flush:')}           ${chalk.white(config.flushMode)}`);

  if (config.dryRun) {
    console.log();
    console.log(chalk.bold.yellow('DRY RUN - the ledger will not be written'));
  }

  console.log();
}

/**
 * Print what one cycle found
 */
export function printSummary(result: CycleResult): void {
  console.log();
  console.log(
    `${chalk.green('✓')} ${chalk.white(`${result.processed.length} checked`)}, ` +
      `${chalk.bold(`${result.events.length} new`)}, ` +
      `${chalk.gray(`${result.empty.length} without transfers`)}, ` +
      `${result.failures.length > 0 ? chalk.red(`${result.failures.length} failed`) : '0 failed'}`
  );

  for (const event of result.events) {
    const when = event.timestamp === undefined ? '' : chalk.gray(` @ ${formatTimestamp(event.timestamp)}`);
    const from = event.previousHash ? shortenTxHash(event.previousHash) : chalk.dim('(none)');
    console.log(
      `  ${chalk.cyan(shortenAddress(event.address))} ${from} → ${chalk.bold(shortenTxHash(event.newHash))}${when}`
    );
  }

  for (const address of result.empty) {
    console.log(`  ${chalk.gray(`No transactions for ${address}`)}`);
  }

  for (const failure of result.failures) {
    console.log(`  ${chalk.red('✗')} ${chalk.cyan(shortenAddress(failure.address))} ${chalk.red(failure.error.message)}`);
  }

  if (result.interrupted) {
    console.log(chalk.yellow('Interrupted before the end of the watch list; progress so far was kept.'));
  }

  console.log();
}

/**
 * Print error message
 */
export function printError(message: string, error?: Error): void {
  console.log();
  console.log(chalk.red.bold('✗ ERROR: ') + chalk.red(message));
  if (error && error.stack) {
    console.log(chalk.gray(error.stack));
  }
  console.log();
}
