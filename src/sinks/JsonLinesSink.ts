import type { ChangeEvent } from '../types.js';
import type { LineWriter, NotificationSink } from './types.js';

export class JsonLinesSink implements NotificationSink {
  public readonly kind = 'json' as const;

  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  async send(event: ChangeEvent): Promise<void> {
    this.write(
      JSON.stringify({
        type: 'transaction.new',
        address: event.address,
        previousHash: event.previousHash ?? null,
        hash: event.newHash,
        timestamp: event.timestamp ?? null,
      })
    );
  }
}
