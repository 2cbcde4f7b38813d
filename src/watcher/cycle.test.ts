import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import type { ChangeEvent, LatestTransfer, StateLedger, TransferSource, TxRecord } from '../types.js';
import { FetchError, NotifyError, PersistError } from '../errors.js';
import type { NotificationSink } from '../sinks/types.js';
import { MemoryStateStore, type StateStore } from '../store/stateStore.js';
import { runWatchCycle, type CycleOptions } from './cycle.js';

type Scripted = string | null | Error;

/**
 * Answers from a per-address script; the last entry repeats once the script runs out
 */
class ScriptedSource implements TransferSource {
  calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: Record<string, Scripted[]>,
    private readonly delayMs = 0
  ) {}

  async getLatestTransfer(address: string): Promise<LatestTransfer | null> {
    this.calls.push(address);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const answers = this.script[address] ?? [null];
      const answer = answers.length > 1 ? answers.shift() : answers[0];
      if (answer instanceof Error) throw answer;
      if (answer === null || answer === undefined) return null;
      return { hash: answer, extra: {} };
    } finally {
      this.inFlight -= 1;
    }
  }
}

class RecordingSink implements NotificationSink {
  public readonly kind = 'console' as const;
  events: ChangeEvent[] = [];

  async send(event: ChangeEvent): Promise<void> {
    this.events.push(event);
  }
}

const silent = pino({ level: 'silent' });

function ledgerOf(entries: Record<string, string>): StateLedger {
  return new Map<string, TxRecord>(
    Object.entries(entries).map(([address, hash]) => [address, { address, hash }])
  );
}

function hashes(ledger: StateLedger): Record<string, string> {
  return Object.fromEntries([...ledger].map(([address, record]) => [address, record.hash]));
}

describe('runWatchCycle', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = new RecordingSink();
  });

  function options(source: TransferSource, extra: Partial<CycleOptions> = {}): CycleOptions {
    return { source, sink, logger: silent, ...extra };
  }

  describe('change detection', () => {
    it('should report an address with no prior record and record its hash', async () => {
      const source = new ScriptedSource({ '0xAAA': ['0x111'] });

      const result = await runWatchCycle(['0xAAA'], ledgerOf({}), options(source));

      expect(result.events).toEqual([{ address: '0xAAA', newHash: '0x111' }]);
      expect(result.events[0]?.previousHash).toBeUndefined();
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x111' });
    });

    it('should not report or mutate when the hash is unchanged', async () => {
      const initial = ledgerOf({ '0xAAA': '0x111' });
      const source = new ScriptedSource({ '0xAAA': ['0x111'] });

      const result = await runWatchCycle(['0xAAA'], initial, options(source));

      expect(result.events).toEqual([]);
      expect(sink.events).toEqual([]);
      expect(result.ledger).toBe(initial);
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x111' });
    });

    it('should report the previous and new hash when the hash changed', async () => {
      const source = new ScriptedSource({ '0xAAA': ['0x222'] });

      const result = await runWatchCycle(['0xAAA'], ledgerOf({ '0xAAA': '0x111' }), options(source));

      expect(result.events).toEqual([{ address: '0xAAA', previousHash: '0x111', newHash: '0x222' }]);
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x222' });
    });

    it('should emit events in watch list order and deliver each to the sink', async () => {
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'] });

      const result = await runWatchCycle(['0xAAA', '0xBBB'], ledgerOf({}), options(source));

      expect(result.events.map((e) => e.address)).toEqual(['0xAAA', '0xBBB']);
      expect(sink.events).toEqual(result.events);
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x111', '0xBBB': '0x222' });
      expect([...result.ledger.keys()]).toEqual(['0xAAA', '0xBBB']);
    });

    it('should be idempotent when run twice without new upstream transactions', async () => {
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'] });

      const first = await runWatchCycle(['0xAAA', '0xBBB'], ledgerOf({}), options(source));
      const second = await runWatchCycle(['0xAAA', '0xBBB'], first.ledger, options(source));

      expect(first.events).toHaveLength(2);
      expect(second.events).toEqual([]);
      expect(second.ledger).toBe(first.ledger);
    });

    it('should keep the timestamp reported by the source', async () => {
      const source: TransferSource = {
        getLatestTransfer: async () => ({
          hash: '0x111',
          timestamp: 1_700_000_000,
          extra: { tokenSymbol: 'TST' },
        }),
      };

      const result = await runWatchCycle(['0xAAA'], ledgerOf({}), options(source));

      expect(result.events).toEqual([
        { address: '0xAAA', newHash: '0x111', timestamp: 1_700_000_000 },
      ]);
      expect(result.ledger.get('0xAAA')).toEqual({
        address: '0xAAA',
        hash: '0x111',
        timestamp: 1_700_000_000,
      });
    });

    it('should never mutate the ledger it was given', async () => {
      const initial = ledgerOf({ '0xAAA': '0x111' });
      const source = new ScriptedSource({ '0xAAA': ['0x999'], '0xBBB': ['0x222'] });

      const result = await runWatchCycle(['0xAAA', '0xBBB'], initial, options(source));

      expect(hashes(initial)).toEqual({ '0xAAA': '0x111' });
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x999', '0xBBB': '0x222' });
    });
  });

  describe('empty accounts', () => {
    it('should treat no transactions as a success without an event', async () => {
      const source = new ScriptedSource({ '0xAAA': [null] });

      const result = await runWatchCycle(['0xAAA'], ledgerOf({}), options(source));

      expect(result.events).toEqual([]);
      expect(result.failures).toEqual([]);
      expect(result.empty).toEqual(['0xAAA']);
      expect(result.ledger.has('0xAAA')).toBe(false);
      expect(result.processed).toEqual(['0xAAA']);
    });
  });

  describe('fetch failures', () => {
    it('should isolate a failing address and keep processing the rest', async () => {
      const error = new FetchError('0xA2', 'network', 'socket hang up');
      const source = new ScriptedSource({
        '0xA1': ['0x111'],
        '0xA2': [error],
        '0xA3': ['0x333'],
      });
      const initial = ledgerOf({ '0xA2': '0xold' });

      const result = await runWatchCycle(['0xA1', '0xA2', '0xA3'], initial, options(source));

      expect(hashes(result.ledger)).toEqual({ '0xA1': '0x111', '0xA2': '0xold', '0xA3': '0x333' });
      expect(result.failures).toEqual([{ address: '0xA2', error }]);
      expect(result.events.map((e) => e.address)).toEqual(['0xA1', '0xA3']);
      expect(result.processed).toEqual(['0xA1', '0xA2', '0xA3']);
    });

    it('should wrap unexpected source errors as FetchError', async () => {
      const source = new ScriptedSource({ '0xAAA': [new TypeError('boom')] });

      const result = await runWatchCycle(['0xAAA'], ledgerOf({}), options(source));

      const failure = result.failures[0];
      expect(failure?.error).toBeInstanceOf(FetchError);
      expect(failure?.error.message).toBe('Fetch error (unknown) for 0xAAA: boom');
    });

    it('should retry rate-limit rejections', async () => {
      const source = new ScriptedSource({
        '0xAAA': [new FetchError('0xAAA', 'rate-limit', 'Max rate limit reached'), '0x111'],
      });

      const result = await runWatchCycle(
        ['0xAAA'],
        ledgerOf({}),
        options(source, { retry: { retries: 2, baseDelayMs: 0 } })
      );

      expect(source.calls).toEqual(['0xAAA', '0xAAA']);
      expect(result.failures).toEqual([]);
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x111' });
    });

    it('should give up after the configured number of rate-limit retries', async () => {
      const source = new ScriptedSource({
        '0xAAA': [new FetchError('0xAAA', 'rate-limit', 'Max rate limit reached')],
      });

      const result = await runWatchCycle(
        ['0xAAA'],
        ledgerOf({}),
        options(source, { retry: { retries: 1, baseDelayMs: 0 } })
      );

      expect(source.calls).toHaveLength(2);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]?.error).toBeInstanceOf(FetchError);
    });

    it('should not retry other failures', async () => {
      const source = new ScriptedSource({
        '0xAAA': [new FetchError('0xAAA', 'http', 'Request failed with status code 502', 502)],
      });

      await runWatchCycle(
        ['0xAAA'],
        ledgerOf({}),
        options(source, { retry: { retries: 3, baseDelayMs: 0 } })
      );

      expect(source.calls).toEqual(['0xAAA']);
    });
  });

  describe('notification failures', () => {
    it('should leave the ledger untouched when the sink rejects', async () => {
      const failingSink: NotificationSink = {
        kind: 'json',
        send: async (event) => {
          if (event.address === '0xAAA') throw new Error('sink down');
        },
      };
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'] });

      const result = await runWatchCycle(['0xAAA', '0xBBB'], ledgerOf({}), {
        source,
        sink: failingSink,
        logger: silent,
      });

      expect(hashes(result.ledger)).toEqual({ '0xBBB': '0x222' });
      expect(result.events.map((e) => e.address)).toEqual(['0xBBB']);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]?.error).toBeInstanceOf(NotifyError);
      expect(result.failures[0]?.error.message).toBe('Notify error for 0xAAA: sink down');
    });
  });

  describe('rate discipline', () => {
    it('should keep at most one fetch in flight', async () => {
      const source = new ScriptedSource(
        { '0xA1': ['0x1'], '0xA2': ['0x2'], '0xA3': ['0x3'], '0xA4': ['0x4'] },
        5
      );

      await runWatchCycle(['0xA1', '0xA2', '0xA3', '0xA4'], ledgerOf({}), options(source));

      expect(source.maxInFlight).toBe(1);
      expect(source.calls).toEqual(['0xA1', '0xA2', '0xA3', '0xA4']);
    });
  });

  describe('incremental flush', () => {
    it('should save after every change', async () => {
      const store = new MemoryStateStore();
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'], '0xCCC': [null] });

      const result = await runWatchCycle(
        ['0xAAA', '0xBBB', '0xCCC'],
        ledgerOf({}),
        options(source, { store, flush: 'per-address' })
      );

      expect(store.getSaveCount()).toBe(2);
      expect(hashes(await store.load())).toEqual(hashes(result.ledger));
    });

    it('should not save from inside the cycle in end mode', async () => {
      const store = new MemoryStateStore();
      const source = new ScriptedSource({ '0xAAA': ['0x111'] });

      await runWatchCycle(['0xAAA'], ledgerOf({}), options(source, { store, flush: 'end' }));

      expect(store.getSaveCount()).toBe(0);
    });

    it('should stop the pass when the ledger cannot be flushed', async () => {
      const persistError = new PersistError('/tmp/ledger.json', 'ENOSPC: no space left on device');
      const store: StateStore = {
        load: async () => ledgerOf({}),
        save: async () => {
          throw persistError;
        },
      };
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'] });

      const result = await runWatchCycle(
        ['0xAAA', '0xBBB'],
        ledgerOf({}),
        options(source, { store, flush: 'per-address' })
      );

      expect(result.persistError).toBe(persistError);
      expect(result.processed).toEqual(['0xAAA']);
      expect(source.calls).toEqual(['0xAAA']);
      expect(sink.events.map((e) => e.address)).toEqual(['0xAAA']);
    });
  });

  describe('interruption', () => {
    it('should stop between addresses once the signal is aborted', async () => {
      const controller = new AbortController();
      const abortingSink: NotificationSink = {
        kind: 'console',
        send: async () => {
          controller.abort();
        },
      };
      const source = new ScriptedSource({ '0xAAA': ['0x111'], '0xBBB': ['0x222'] });

      const result = await runWatchCycle(['0xAAA', '0xBBB'], ledgerOf({}), {
        source,
        sink: abortingSink,
        signal: controller.signal,
        logger: silent,
      });

      expect(result.interrupted).toBe(true);
      expect(result.processed).toEqual(['0xAAA']);
      expect(hashes(result.ledger)).toEqual({ '0xAAA': '0x111' });
    });
  });
});
