import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, createLogger } from './logger';
import { makeMask } from './redact';
import { MemorySink } from './sinks';
import { LogLevel } from './types';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes entries at or above its level', () => {
    const sink = new MemorySink();
    const logger = createLogger({ name: 'hmcclient.hmc', level: LogLevel.INFO, sinks: [sink] });

    logger.debug('hidden');
    logger.info('GET /api/cpcs');
    logger.fatal('connection lost');

    expect(sink.messages()).toEqual(['GET /api/cpcs', 'connection lost']);
    expect(sink.logs[0].level).toBe('info');
    expect(sink.logs[0].logger).toBe('hmcclient.hmc');
    expect(sink.logs[0].timestamp).toBeTypeOf('string');
  });

  it('defaults to INFO without a level anywhere', () => {
    expect(new Logger({ name: 'standalone' }).getEffectiveLevel()).toBe(LogLevel.INFO);
  });

  it('inherits the level of its parent until it sets its own', () => {
    const parent = new Logger({ name: 'hmcclient', level: LogLevel.DEBUG });
    const child = new Logger({ name: 'hmcclient.api', parent });

    expect(child.getLevel()).toBeUndefined();
    expect(child.isEnabledFor(LogLevel.DEBUG)).toBe(true);

    child.setLevel(LogLevel.ERROR);
    expect(child.isEnabledFor(LogLevel.WARN)).toBe(false);

    child.setLevel(undefined);
    expect(child.getEffectiveLevel()).toBe(LogLevel.DEBUG);
  });

  it('propagates entries to ancestor sinks unless disabled', () => {
    const parentSink = new MemorySink();
    const childSink = new MemorySink();
    const parent = new Logger({ name: 'hmcclient', sinks: [parentSink] });
    const child = new Logger({ name: 'hmcclient.api', parent, sinks: [childSink] });

    child.info('first');
    child.propagate = false;
    child.info('second');

    expect(childSink.messages()).toEqual(['first', 'second']);
    expect(parentSink.messages()).toEqual(['first']);
  });

  it('merges context and data without overwriting entry fields', () => {
    const sink = new MemorySink();
    const logger = new Logger({ name: 'hmcclient.hmc', sinks: [sink] }).child({ host: 'hmc1' });

    logger.info('request', { method: 'GET', message: 'spoofed', logger: 'other' });

    const [entry] = sink.logs;
    expect(entry.message).toBe('request');
    expect(entry.logger).toBe('hmcclient.hmc');
    expect(entry.host).toBe('hmc1');
    expect(entry.method).toBe('GET');
  });

  it('masks structured data', () => {
    const sink = new MemorySink();
    const logger = new Logger({ name: 'hmcclient.hmc', sinks: [sink], mask: makeMask() });

    logger.info('logon', { body: { userid: 'ops', password: 'test-secret' } });

    expect(sink.logs[0].body).toEqual({ userid: 'ops', password: '***' });
  });

  it('keeps writing to other sinks when one fails', () => {
    const sink = new MemorySink();
    const onSinkError = vi.fn();
    const failure = new Error('stream closed');
    const logger = new Logger({
      name: 'hmcclient.hmc',
      sinks: [{ write: () => { throw failure; } }, sink],
      onSinkError,
    });

    logger.warn('slow response');

    expect(sink.messages()).toEqual(['slow response']);
    expect(onSinkError).toHaveBeenCalledTimes(1);
    expect(onSinkError.mock.calls[0][0]).toBe(failure);
  });

  it('ignores sink failures silently by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ name: 'hmcclient.hmc', sinks: [{ write: () => { throw new Error('stream closed'); } }] });

    expect(() => logger.error('request failed')).not.toThrow();
    expect(spy).not.toHaveBeenCalled();
  });

  it('adds and removes sinks', () => {
    const sink = new MemorySink();
    const logger = new Logger({ name: 'hmcclient.api' });

    expect(logger.hasSinks()).toBe(false);
    logger.addSink(sink);
    logger.info('one');
    logger.removeSink(sink);
    logger.info('two');

    expect(sink.messages()).toEqual(['one']);
    expect(logger.getSinks()).toEqual([]);
  });
});
