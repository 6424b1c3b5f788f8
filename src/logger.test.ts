import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { frameName } from './callsite';
import { resolveConfig, setConfig } from './config';
import {
  Logger,
  configureLogging,
  debug,
  error,
  exception,
  info,
  isTestName,
  resetLogging,
  setTestNamePattern,
  warning,
} from './logger';
import { SinkConfig } from './sink-config';
import { MemorySink } from './sinks';
import { LogLevel } from './types';

function namedCaller() {
  info('hello');
}

function failingCaller() {
  error('went wrong');
}

function helperStep() {
  debug('step');
}

function test_login() {
  helperStep();
}

function plainCaller() {
  helperStep();
}

describe('Logger', () => {
  it('should drop records below its level', () => {
    const sink = new MemorySink();
    const logger = new Logger({ level: LogLevel.WARNING, sinks: [sink] });
    logger.info('quiet');
    logger.warning('loud');
    expect(sink.messages()).toEqual(['loud']);
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('now visible');
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(sink.messages()).toEqual(['loud', 'now visible']);
  });

  it('should stamp records with the injected clock', () => {
    const sink = new MemorySink();
    const at = new Date(2024, 0, 2, 3, 4, 5);
    const logger = new Logger({ sinks: [sink], now: () => at });
    logger.error('x');
    expect(sink.logs).toEqual([{ level: LogLevel.ERROR, timestamp: at, message: 'x' }]);
  });

  it('should stop writing to removed sinks', () => {
    const a = new MemorySink();
    const b = new MemorySink();
    const logger = new Logger({ sinks: [a] });
    logger.addSink(b);
    logger.info('both');
    logger.removeSink(a);
    logger.info('only b');
    expect(a.messages()).toEqual(['both']);
    expect(b.messages()).toEqual(['both', 'only b']);
  });
});

describe('logging facade', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
    configureLogging({ sinks: [sink] });
  });

  afterEach(async () => {
    await resetLogging();
    setTestNamePattern(/^test[_A-Z0-9]/);
  });

  it('should prefix info with the calling function name', () => {
    namedCaller();
    expect(sink.logs).toHaveLength(1);
    expect(sink.logs[0]?.level).toBe(LogLevel.INFO);
    expect(sink.logs[0]?.message).toBe('[namedCaller]: hello');
  });

  it('should prefix error with the calling function name', () => {
    failingCaller();
    expect(sink.logs[0]?.level).toBe(LogLevel.ERROR);
    expect(sink.logs[0]?.message).toBe('[failingCaller]: went wrong');
  });

  it('should honor autoPrefix and an explicit caller', () => {
    info('raw', { autoPrefix: false });
    info('named', { caller: 'openSettings' });
    expect(sink.messages()).toEqual(['raw', '[openSettings]: named']);
  });

  it('should promote debug to INFO when the caller was called from a test function', () => {
    test_login();
    plainCaller();
    expect(sink.logs.map((e) => [e.level, e.message])).toEqual([
      [LogLevel.INFO, '[helperStep]: step'],
      [LogLevel.DEBUG, '[helperStep]: step'],
    ]);
  });

  it('should use explicit caller names for debug', () => {
    debug('a', { caller: 'click', grandcaller: 'test_checkout' });
    debug('b', { caller: 'click', grandcaller: 'checkout' });
    expect(sink.logs.map((e) => [e.level, e.message])).toEqual([
      [LogLevel.INFO, '[click]: a'],
      [LogLevel.DEBUG, '[click]: b'],
    ]);
  });

  it('should follow a custom test-name pattern', () => {
    setTestNamePattern(/^should/);
    debug('x', { caller: 'click', grandcaller: 'shouldOpen' });
    expect(sink.logs[0]?.level).toBe(LogLevel.INFO);
    expect(isTestName('test_login')).toBe(false);
  });

  it('should log warnings without a prefix', () => {
    warning('careful');
    expect(sink.logs[0]?.level).toBe(LogLevel.WARNING);
    expect(sink.logs[0]?.message).toBe('careful');
  });

  it('should append the stack to exception records', () => {
    exception('boom', new Error('bad'));
    exception('plain');
    exception('odd', 42);
    expect(sink.logs[0]?.level).toBe(LogLevel.ERROR);
    expect(sink.logs[0]?.message).toMatch(/^boom\nError: bad\n/);
    expect(sink.logs[1]?.message).toBe('plain');
    expect(sink.logs[2]?.message).toBe('odd\n42');
  });
});

describe('isTestName', () => {
  it('should match test functions only', () => {
    expect(isTestName('test_login')).toBe(true);
    expect(isTestName('testLogin')).toBe(true);
    expect(isTestName('testament')).toBe(false);
    expect(isTestName(undefined)).toBe(false);
  });
});

describe('frameName', () => {
  it('should read the function name of a stack line', () => {
    expect(frameName('    at helperStep (/x/a.ts:3:5)')).toBe('helperStep');
    expect(frameName('    at Page.open (/x/a.ts:3:5)')).toBe('open');
    expect(frameName('    at async runTest (/x/a.ts:3:5)')).toBe('runTest');
    expect(frameName('    at new Session (/x/a.ts:3:5)')).toBe('Session');
    expect(frameName('    at Proxy.click [as tap] (/x/a.ts:3:5)')).toBe('tap');
  });

  it('should return undefined for anonymous frames', () => {
    expect(frameName('    at Object.<anonymous> (/x/a.ts:1:1)')).toBeUndefined();
    expect(frameName('    at /x/a.ts:3:5')).toBeUndefined();
  });
});

describe('lazy sink configuration', () => {
  let dir: string;

  beforeEach(async () => {
    await resetLogging();
    dir = mkdtempSync(join(tmpdir(), 'calltrace-'));
  });

  afterEach(async () => {
    await resetLogging();
    setConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should build the day files on first use and write every record to the debug file', async () => {
    setConfig(resolveConfig(
      { LOG_FILE_PATH: dir, SYS_ARCH: 'x86_64', HOST_IP: '10.0.0.7', LOG_LEVEL: LogLevel.ERROR },
      {}
    ));
    warning('lazy');
    await resetLogging();

    const files = readdirSync(join(dir, 'logs')).sort();
    expect(files).toHaveLength(2);
    const debugFile = files.find((f) => f.endsWith('_debug.log')) ?? '';
    const errorFile = files.find((f) => f.endsWith('_error.log')) ?? '';
    expect(readFileSync(join(dir, 'logs', debugFile), 'utf-8'))
      .toMatch(/^x86_64-7: \d\d\/\d\d \d\d:\d\d:\d\d \| WARNING \| lazy\n$/);
    expect(readFileSync(join(dir, 'logs', errorFile), 'utf-8')).toBe('');
  });

  it('should close lazily built files when explicit sinks are installed', async () => {
    setConfig(resolveConfig({ LOG_FILE_PATH: dir, SYS_ARCH: 'x86_64', HOST_IP: '', LOG_LEVEL: LogLevel.ERROR }, {}));
    const close = vi.spyOn(SinkConfig.prototype, 'close');
    warning('lazy');
    const sink = new MemorySink();
    configureLogging({ sinks: [sink] });

    expect(close).toHaveBeenCalledTimes(1);
    await close.mock.results[0]?.value;
    warning('after');
    expect(sink.messages()).toEqual(['after']);
    close.mockRestore();
  });
});
