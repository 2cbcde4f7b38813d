import type { AppConfig } from './types.js';
import { EtherscanClient } from './explorer/etherscan.js';
import { logger } from './logger.js';
import { SequentialLimiter } from './watcher/limiter.js';

/**
 * Build the explorer client from config
 */
export function createExplorerClient(config: AppConfig): EtherscanClient {
  logger.info(
    {
      apiUrl: config.apiUrl,
      chainId: config.chainId,
      tokenContract: config.tokenContract,
      timeoutMs: config.requestTimeoutMs,
    },
    'Explorer client initialized'
  );

  return new EtherscanClient({
    apiKey: config.apiKey,
    baseUrl: config.apiUrl,
    timeoutMs: config.requestTimeoutMs,
    chainId: config.chainId,
    contractAddress: config.tokenContract,
  });
}

/**
 * One limiter per process: every explorer request goes through it
 */
export function createRequestLimiter(config: AppConfig): SequentialLimiter {
  return new SequentialLimiter({ minIntervalMs: config.requestIntervalMs });
}
