import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { AppConfig, FlushMode } from './types.js';
import { ConfigError } from './errors.js';
import { DEFAULT_ETHERSCAN_API_URL } from './explorer/etherscan.js';
import { isValidAddress, normalizeAddress } from './utils/address.js';

// Load environment variables
loadEnv();

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

export const flushModeSchema = z.enum(['per-address', 'end']);

// Validation schemas
const envSchema = z.object({
  ETHERSCAN_API_KEY: z.string().min(1),
  ETHERSCAN_API_URL: z.string().url().default(DEFAULT_ETHERSCAN_API_URL),
  ETHERSCAN_CHAIN_ID: positiveInt.optional(),
  TOKEN_CONTRACT_ADDRESS: z
    .string()
    .refine(isValidAddress, {
      message: 'Invalid Ethereum address format',
    })
    .optional(),
  WATCHLIST_PATH: z.string().min(1).default('addrs.txt'),
  LEDGER_PATH: z.string().min(1).default('latest_txs.txt'),
  REQUEST_TIMEOUT_MS: positiveInt.default(10_000),
  REQUEST_INTERVAL_MS: nonNegativeInt.default(250),
  RATE_LIMIT_RETRIES: nonNegativeInt.default(2),
  RETRY_BASE_DELAY_MS: nonNegativeInt.default(1_000),
  FLUSH_MODE: flushModeSchema.default('per-address'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ConfigOptions {
  watchlistPath?: string;
  ledgerPath?: string;
  flushMode?: FlushMode;
}

type Env = Record<string, string | undefined>;

/**
 * Build the config from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: Env = process.env, options: ConfigOptions = {}): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const envResult = envSchema.safeParse(present);

  if (!envResult.success) {
    const errors = envResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Environment validation failed:\n${errors.join('\n')}`);
  }

  const parsed = envResult.data;

  return {
    apiKey: parsed.ETHERSCAN_API_KEY,
    apiUrl: parsed.ETHERSCAN_API_URL,
    chainId: parsed.ETHERSCAN_CHAIN_ID,
    tokenContract: parsed.TOKEN_CONTRACT_ADDRESS
      ? normalizeAddress(parsed.TOKEN_CONTRACT_ADDRESS)
      : undefined,
    watchlistPath: options.watchlistPath ?? parsed.WATCHLIST_PATH,
    ledgerPath: options.ledgerPath ?? parsed.LEDGER_PATH,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    requestIntervalMs: parsed.REQUEST_INTERVAL_MS,
    rateLimitRetries: parsed.RATE_LIMIT_RETRIES,
    retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    flushMode: options.flushMode ?? parsed.FLUSH_MODE,
    logLevel: parsed.LOG_LEVEL,
  };
}

/**
 * Load config from the process environment with optional CLI overrides
 */
export function initConfig(options?: ConfigOptions): AppConfig {
  return loadConfig(process.env, options);
}
