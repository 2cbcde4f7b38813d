import { open, readFile, rename, rm } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { StateLedger } from '../types.js';
import {
  CorruptStateError,
  PersistError,
  StateReadError,
  isNotFoundError,
  toError,
} from '../errors.js';
import { logger } from '../logger.js';
import {
  emptyLedger,
  findCollidingKeys,
  fromStored,
  serializeLedger,
  storedLedgerSchema,
} from './ledger.js';

/**
 * Durable home of the ledger between runs
 */
export interface StateStore {
  load(): Promise<StateLedger>;
  save(ledger: StateLedger): Promise<void>;
}

/**
 * Parse ledger file contents. Blank content is an empty ledger, anything else
 * must be a JSON object of address -> hash (or { hash, timestamp }) with at
 * most one key per address, compared case-insensitively.
 */
export function parseLedger(text: string, path: string): StateLedger {
  if (text.trim() === '') {
    return emptyLedger();
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new CorruptStateError(path, 'not valid JSON', toError(error));
  }

  const result = storedLedgerSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new CorruptStateError(path, `unexpected structure (${issues.join('; ')})`);
  }

  const collisions = findCollidingKeys(result.data);
  if (collisions.length > 0) {
    const listed = collisions.map((keys) => keys.join(' / '));
    throw new CorruptStateError(path, `duplicate addresses (${listed.join('; ')})`);
  }

  return fromStored(result.data);
}

/**
 * JSON file store. Writes go to a sibling temp file which is fsynced and then
 * renamed over the target, so readers only ever see a complete ledger.
 */
export class FileStateStore implements StateStore {
  constructor(private readonly path: string) {}

  async load(): Promise<StateLedger> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.info({ path: this.path }, 'No ledger found, starting with an empty one');
        return emptyLedger();
      }
      throw new StateReadError(this.path, toError(error));
    }

    const ledger = parseLedger(text, this.path);
    logger.debug({ path: this.path, entries: ledger.size }, 'Ledger loaded');
    return ledger;
  }

  async save(ledger: StateLedger): Promise<void> {
    const tempPath = join(
      dirname(this.path),
      `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`
    );
    const content = serializeLedger(ledger);

    try {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug(
          { tempPath, error: toError(cleanupError).message },
          'Failed to remove temporary ledger file'
        );
      });
      throw new PersistError(this.path, toError(error).message, toError(error));
    }

    logger.debug({ path: this.path, entries: ledger.size }, 'Ledger saved');
  }
}

/**
 * Keeps the ledger in memory only. Used for dry runs and tests.
 */
export class MemoryStateStore implements StateStore {
  private ledger: StateLedger;
  private saves = 0;

  constructor(initial: StateLedger = emptyLedger()) {
    this.ledger = new Map(initial);
  }

  async load(): Promise<StateLedger> {
    return new Map(this.ledger);
  }

  async save(ledger: StateLedger): Promise<void> {
    this.ledger = new Map(ledger);
    this.saves += 1;
  }

  getSaveCount(): number {
    return this.saves;
  }
}
