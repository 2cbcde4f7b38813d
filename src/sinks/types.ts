import type { ChangeEvent } from '../types.js';

export type SinkKind = 'console' | 'json';

/**
 * Receives change events one at a time, in emission order.
 * A rejected send leaves the address's ledger entry untouched.
 */
export interface NotificationSink {
  readonly kind: SinkKind;
  send(event: ChangeEvent): Promise<void>;
}

export type LineWriter = (line: string) => void;
