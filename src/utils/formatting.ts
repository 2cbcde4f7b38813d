import type { ChangeEvent } from '../types.js';

/**
 * `New transaction for <address>, hash: <hash>`
 */
export function formatChangeEvent(event: ChangeEvent): string {
  return `New transaction for ${event.address}, hash: ${event.newHash}`;
}

/**
 * Shorten address for display (0x1234...5678)
 */
export function shortenAddress(address: string): string {
  if (address.length < 10) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

/**
 * Shorten transaction hash for display
 */
export function shortenTxHash(hash: string): string {
  if (hash.length < 10) return hash;
  return `${hash.slice(0, 8)}...${hash.slice(-6)}`;
}

/**
 * Format a unix timestamp (seconds) to ISO string
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
