import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LatestTransfer, TransferSource } from '../types.js';
import { FetchError, toError } from '../errors.js';
import { logger } from '../logger.js';

export const DEFAULT_ETHERSCAN_API_URL = 'https://api.etherscan.io/api';

export interface EtherscanClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Sent as `chainid` for multichain (v2) endpoints */
  chainId?: number;
  /** Only report transfers of this token contract */
  contractAddress?: string;
  /** Preconfigured axios instance; baseUrl and timeoutMs are ignored when given */
  http?: AxiosInstance;
}

const transferSchema = z
  .object({
    hash: z.string().min(1),
    timeStamp: z
      .string()
      .regex(/^\d+$/)
      .transform(Number)
      .pipe(z.number().int().safe())
      .optional(),
  })
  .passthrough();

const responseSchema = z.object({
  status: z.string(),
  message: z.string(),
  result: z.union([z.array(transferSchema), z.string()]),
});

type TransferItem = z.infer<typeof transferSchema>;

const RATE_LIMIT_PATTERN = /rate limit/i;
const NO_TRANSACTIONS_PATTERN = /^no transactions found/i;

function toLatestTransfer(item: TransferItem): LatestTransfer {
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(item)) {
    if (key === 'hash' || key === 'timeStamp') continue;
    if (typeof value === 'string') {
      extra[key] = value;
    }
  }

  return {
    hash: item.hash,
    timestamp: item.timeStamp,
    extra,
  };
}

/**
 * Token-transfer lookups against an Etherscan-compatible API
 * (`module=account&action=tokentx`), newest first, one result per call.
 */
export class EtherscanClient implements TransferSource {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly chainId?: number;
  private readonly contractAddress?: string;

  constructor(options: EtherscanClientOptions) {
    this.apiKey = options.apiKey;
    this.chainId = options.chainId;
    this.contractAddress = options.contractAddress;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_ETHERSCAN_API_URL,
        timeout: options.timeoutMs ?? 10_000,
      });
  }

  async getLatestTransfer(address: string): Promise<LatestTransfer | null> {
    const params: Record<string, string | number> = {
      module: 'account',
      action: 'tokentx',
      address,
      page: 1,
      offset: 1,
      sort: 'desc',
      apikey: this.apiKey,
    };
    if (this.chainId !== undefined) {
      params.chainid = this.chainId;
    }
    if (this.contractAddress) {
      params.contractaddress = this.contractAddress;
    }

    let payload: unknown;
    try {
      const response = await this.http.get<unknown>('', { params });
      payload = response.data;
    } catch (error) {
      throw this.toFetchError(address, error);
    }

    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new FetchError(address, 'malformed', `Unexpected response (${issues.join('; ')})`);
    }

    const { status, message, result } = parsed.data;

    if (status === '1' && Array.isArray(result)) {
      const [latest] = result;
      if (!latest) {
        return null;
      }
      logger.debug({ address, hash: latest.hash }, 'Fetched latest transfer');
      return toLatestTransfer(latest);
    }

    if (status === '0') {
      if (NO_TRANSACTIONS_PATTERN.test(message) || (Array.isArray(result) && result.length === 0)) {
        return null;
      }
      const detail = typeof result === 'string' ? result : message;
      if (RATE_LIMIT_PATTERN.test(detail) || RATE_LIMIT_PATTERN.test(message)) {
        throw new FetchError(address, 'rate-limit', detail);
      }
      throw new FetchError(address, 'api', detail);
    }

    throw new FetchError(address, 'malformed', `Unexpected status "${status}" (${message})`);
  }

  private toFetchError(address: string, error: unknown): FetchError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 429) {
        return new FetchError(address, 'rate-limit', error.message, status, error);
      }
      if (status !== undefined) {
        return new FetchError(address, 'http', error.message, status, error);
      }
      return new FetchError(address, 'network', error.message, undefined, error);
    }
    const cause = toError(error);
    return new FetchError(address, 'network', cause.message, undefined, cause);
  }
}
