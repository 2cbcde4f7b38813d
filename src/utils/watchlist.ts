import { readFile } from 'fs/promises';
import type { WatchList } from '../types.js';
import { ConfigError, isNotFoundError, toError } from '../errors.js';
import { logger } from '../logger.js';
import { dedupeAddresses, isValidAddress } from './address.js';

/**
 * Parse a watch list: one address per line, `#` starts a comment.
 * Addresses come back lowercased and deduplicated in file order.
 * Malformed lines are logged and skipped.
 */
export function parseWatchList(text: string): WatchList {
  const addresses: string[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) return;

    if (!isValidAddress(line)) {
      logger.warn({ line: index + 1, value: line }, 'Skipping invalid address in watch list');
      return;
    }
    addresses.push(line);
  });

  return dedupeAddresses(addresses);
}

export async function readWatchList(path: string): Promise<WatchList> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigError(`Watch list file not found at: ${path}`);
    }
    throw new ConfigError(`Failed to read watch list: ${toError(error).message}`);
  }

  return parseWatchList(text);
}
