import { describe, it, expect, vi, afterEach } from 'vitest';
import type { IngestEventHooks, WorkerStartEvent } from '@plenar/contracts';
import { createLogger } from '@plenar/shared';
import { CompositeEventHooks, LoggingEventHooks, NoopEventHooks } from './hooks.js';

const base = { workerId: 'run-1/w1', source: 'MDB_STAMMDATEN.XML', timestamp: '2024-01-01T00:00:00.000Z' };

describe('CompositeEventHooks', () => {
  it('should dispatch every event to every listener', async () => {
    const first = { onWorkerStart: vi.fn() };
    const second = { onWorkerStart: vi.fn().mockResolvedValue(undefined) };
    const composite = new CompositeEventHooks([first, second, new NoopEventHooks()]);

    await composite.onWorkerStart(base);

    expect(first.onWorkerStart).toHaveBeenCalledWith(base);
    expect(second.onWorkerStart).toHaveBeenCalledWith(base);
  });

  it('should wait for asynchronous listeners', async () => {
    const seen: string[] = [];
    const slow: IngestEventHooks = {
      async onWorkerComplete() {
        await new Promise((resolve) => setTimeout(resolve, 5));
        seen.push('slow');
      },
    };
    const composite = new CompositeEventHooks([slow]);

    await composite.onWorkerComplete({ ...base, stored: 1, failed: 0, durationMs: 3 });

    expect(seen).toEqual(['slow']);
  });

  it('should propagate listener failures', async () => {
    const failing: IngestEventHooks = {
      onRecordsStored() {
        throw new Error('listener broke');
      },
    };
    const composite = new CompositeEventHooks([failing]);

    await expect(
      composite.onRecordsStored({ ...base, collection: 'mdb', count: 1, total: 1 }),
    ).rejects.toThrow('listener broke');
  });
});

describe('LoggingEventHooks', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log worker events with the worker id', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const hooks = new LoggingEventHooks(createLogger({ prefix: 'test' }));
    const event: WorkerStartEvent = base;

    hooks.onWorkerStart(event);

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(
      /^\[[^\]]+\] \[INFO\] \[test\] Worker started \{"workerId":"run-1\/w1","source":"MDB_STAMMDATEN.XML"\}$/,
    );
  });

  it('should log skipped records as warnings and aborting ones as errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const hooks = new LoggingEventHooks(createLogger({ prefix: 'test' }));

    hooks.onRecordFailed({ ...base, position: 3, error: new Error('bad date'), skipped: true });
    hooks.onRecordFailed({ ...base, position: 4, error: new Error('bad date'), skipped: false });

    expect(warn.mock.calls[0]?.[0]).toContain(
      'Record skipped {"workerId":"run-1/w1","source":"MDB_STAMMDATEN.XML","position":3,"error":{"name":"Error","message":"bad date"}}',
    );
    expect(error.mock.calls[0]?.[0]).toContain('Record failed');
  });

  it('should leave records-stored events to the debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const quiet = new LoggingEventHooks(createLogger({ level: 'info' }));
    const verbose = new LoggingEventHooks(createLogger({ level: 'debug' }));
    const event = { ...base, collection: 'mdb', count: 2, total: 2 };

    quiet.onRecordsStored(event);
    expect(debug).not.toHaveBeenCalled();

    verbose.onRecordsStored(event);
    expect(debug).toHaveBeenCalledTimes(1);
  });
});
