import type { FetchError, NotifyError, PersistError } from './errors.js';

/**
 * Ordered list of addresses to poll. Never mutated by a cycle.
 */
export type WatchList = readonly string[];

/**
 * Last-known transaction for one address
 */
export interface TxRecord {
  address: string;
  hash: string;
  /** Unix time in seconds, as reported by the explorer */
  timestamp?: number;
}

/**
 * Address -> last-known transaction. At most one record per address.
 */
export type StateLedger = ReadonlyMap<string, TxRecord>;

export interface ChangeEvent {
  address: string;
  previousHash?: string;
  newHash: string;
  timestamp?: number;
}

/**
 * Latest token transfer as returned by the data source.
 * `extra` carries every other attribute of the explorer payload; the cycle never reads it.
 */
export interface LatestTransfer {
  hash: string;
  timestamp?: number;
  extra: Readonly<Record<string, string>>;
}

/**
 * Resolves to `null` when the address has no transfers at all.
 */
export interface TransferSource {
  getLatestTransfer(address: string): Promise<LatestTransfer | null>;
}

export interface CycleFailure {
  address: string;
  error: FetchError | NotifyError;
}

export interface CycleResult {
  ledger: StateLedger;
  events: ChangeEvent[];
  failures: CycleFailure[];
  /** Addresses that returned no transfers */
  empty: string[];
  /** Every address the pass reached, in order */
  processed: string[];
  interrupted: boolean;
  persistError?: PersistError;
}

export type FlushMode = 'per-address' | 'end';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  apiKey: string;
  apiUrl: string;
  chainId?: number;
  tokenContract?: string;
  watchlistPath: string;
  ledgerPath: string;
  requestTimeoutMs: number;
  requestIntervalMs: number;
  rateLimitRetries: number;
  retryBaseDelayMs: number;
  flushMode: FlushMode;
  logLevel: LogLevel;
}
