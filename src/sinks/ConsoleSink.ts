import type { ChangeEvent } from '../types.js';
import { formatChangeEvent } from '../utils/formatting.js';
import type { LineWriter, NotificationSink } from './types.js';

/**
 * Default sink: one human-readable line per change
 */
export class ConsoleSink implements NotificationSink {
  public readonly kind = 'console' as const;

  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  async send(event: ChangeEvent): Promise<void> {
    this.write(formatChangeEvent(event));
  }
}
