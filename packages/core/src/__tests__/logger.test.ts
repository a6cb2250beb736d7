import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, createLogger, jsonSink, prettySink, type LogEntry } from '../observability/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create via factory', () => {
    expect(createLogger({ module: 'test' })).toBeInstanceOf(Logger);
  });

  it('should prefix child modules and keep the sink', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ module: 'server', handler: (e) => entries.push(e) });
    logger.child('coordinator').child('locks').info('joined');
    expect(entries[0]?.module).toBe('server:coordinator:locks');
  });

  it('should filter below the configured level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
    logger.debug('debug msg');
    logger.info('info msg');
    logger.warn('warn msg');
    logger.error('error msg');
    expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
  });

  it('should pass the level on to children', () => {
    const entries: LogEntry[] = [];
    const child = createLogger({ level: 'warn', handler: (e) => entries.push(e) }).child('rooms');
    child.info('hidden');
    child.warn('shown');
    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  it('should stay silent without a sink', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger({ module: 'test' }).error('nobody listens');
    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('should attach error details and context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
    logger.error('publish failed', new Error('boom'), { channel: 'room:1' });
    expect(entries[0]?.context).toMatchObject({
      channel: 'room:1',
      error: { name: 'Error', message: 'boom' },
    });
  });

  it('should stringify non-error values passed to error()', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
    logger.error('odd failure', 42);
    logger.error('bare failure');
    expect(entries[0]?.context).toEqual({ error: { message: '42' } });
    expect(entries[1]?.context).toBeUndefined();
  });
});

describe('sinks', () => {
  const entry: LogEntry = {
    level: 'warn',
    message: 'Backplane degraded',
    timestamp: 0,
    module: 'tessera:backplane',
    context: { channel: 'room:r1' },
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write JSON lines to stderr for warnings', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    jsonSink(entry);
    expect(error).toHaveBeenCalledWith(JSON.stringify(entry));
  });

  it('should write readable lines', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    prettySink({ level: 'info', message: 'Listening', timestamp: 0, module: 'tessera' });
    expect(log).toHaveBeenCalledWith('1970-01-01T00:00:00.000Z INFO  [tessera] Listening');
  });

  it('should append context to readable lines', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    prettySink(entry);
    expect(error).toHaveBeenCalledWith(
      '1970-01-01T00:00:00.000Z WARN  [tessera:backplane] Backplane degraded {"channel":"room:r1"}'
    );
  });
});
