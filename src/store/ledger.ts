import { z } from 'zod';
import type { StateLedger, TxRecord } from '../types.js';
import { normalizeAddress } from '../utils/address.js';

export function emptyLedger(): StateLedger {
  return new Map<string, TxRecord>();
}

/**
 * Return a copy of `ledger` with `address` pointing at `hash`. The input is left untouched.
 */
export function upsert(
  ledger: StateLedger,
  address: string,
  hash: string,
  timestamp?: number
): StateLedger {
  const next = new Map(ledger);
  const record: TxRecord = timestamp === undefined ? { address, hash } : { address, hash, timestamp };
  next.set(address, record);
  return next;
}

// Written as bare hashes; the object form is still accepted on read.
const storedRecordSchema = z.union([
  z.string().min(1),
  z
    .object({
      hash: z.string().min(1),
      timestamp: z.number().int().nonnegative().optional(),
    })
    .strict(),
]);

export const storedLedgerSchema = z.record(storedRecordSchema);

export type StoredLedger = z.infer<typeof storedLedgerSchema>;

/**
 * Keys are normalized to lowercase addresses, so checksummed entries match the
 * watch list. Use `findCollidingKeys` first: colliding keys would silently merge.
 */
export function fromStored(stored: StoredLedger): StateLedger {
  const ledger = new Map<string, TxRecord>();

  for (const [key, value] of Object.entries(stored)) {
    const address = normalizeAddress(key);
    if (typeof value === 'string') {
      ledger.set(address, { address, hash: value });
    } else if (value.timestamp === undefined) {
      ledger.set(address, { address, hash: value.hash });
    } else {
      ledger.set(address, { address, hash: value.hash, timestamp: value.timestamp });
    }
  }

  return ledger;
}

/**
 * Groups of stored keys that name the same address once normalized
 */
export function findCollidingKeys(stored: StoredLedger): string[][] {
  const groups = new Map<string, string[]>();

  for (const key of Object.keys(stored)) {
    const address = normalizeAddress(key);
    groups.set(address, [...(groups.get(address) ?? []), key]);
  }

  return [...groups.values()].filter((keys) => keys.length > 1);
}

/**
 * address -> hash. Timestamps stay in memory only.
 */
export function toStored(ledger: StateLedger): Record<string, string> {
  const stored: Record<string, string> = {};

  for (const [address, record] of ledger) {
    stored[address] = record.hash;
  }

  return stored;
}

/**
 * Serialize for disk: 4-space indented JSON with a trailing newline
 */
export function serializeLedger(ledger: StateLedger): string {
  return `${JSON.stringify(toStored(ledger), null, 4)}\n`;
}
