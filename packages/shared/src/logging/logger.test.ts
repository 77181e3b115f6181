import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';

const LINE = /^\[(\d{4}-\d{2}-\d{2}T[^\]]+)\] \[(\w+)\] \[([^\]]+)\] (.*)$/;

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format lines with timestamp, level and prefix', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    createLogger({ prefix: 'ingest' }).info('File parsed');

    const match = LINE.exec(String(info.mock.calls[0]?.[0]));
    expect(match?.slice(2)).toEqual(['INFO', 'ingest', 'File parsed']);
  });

  it('should default the prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger().warn('careful');

    expect(String(warn.mock.calls[0]?.[0])).toMatch(/\[WARN\] \[plenar\] careful$/);
  });

  it('should append merged context as JSON', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    createLogger({ context: { runId: 'run-1' } }).info('stored', { count: 2 });

    expect(String(info.mock.calls[0]?.[0])).toMatch(/ stored \{"runId":"run-1","count":2\}$/);
  });

  it('should serialize errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger().error('failed', { error: new TypeError('boom') });

    expect(String(error.mock.calls[0]?.[0])).toMatch(
      / failed \{"error":\{"name":"TypeError","message":"boom"\}\}$/,
    );
  });

  it('should drop messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it('should give children the parent context and level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const child = createLogger({ level: 'info', context: { runId: 'run-1' } }).child({ workerId: 'run-1/w1' });

    child.debug('hidden');
    child.info('started');

    expect(debug).not.toHaveBeenCalled();
    expect(String(info.mock.calls[0]?.[0])).toMatch(
      / started \{"runId":"run-1","workerId":"run-1\/w1"\}$/,
    );
  });
});

describe('isLogLevel', () => {
  it('should accept the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error', 'trace', 'toString'].filter(isLogLevel)).toEqual([
      'debug',
      'info',
      'warn',
      'error',
    ]);
  });
});
