import { isAddress } from 'viem';

/**
 * Normalize an Ethereum address to lowercase
 */
export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

/**
 * Check that a string is a well-formed EVM address (checksum not enforced)
 */
export function isValidAddress(address: string): boolean {
  return isAddress(address, { strict: false });
}

/**
 * Remove duplicates, keeping the first occurrence of each address
 */
export function dedupeAddresses(addresses: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const address of addresses) {
    const normalized = normalizeAddress(address);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    unique.push(normalized);
  }

  return unique;
}
