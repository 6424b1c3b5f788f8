import { describe, it, expect } from 'vitest';
import { createColorFormatter, createPlainFormatter, hostLabel, safeJson, shouldColor, textOf } from './format';
import { LogLevel } from './types';

const at = new Date(2024, 2, 5, 14, 7, 9);

describe('hostLabel', () => {
  it('should append the last octet of an IPv4 address', () => {
    expect(hostLabel('amd64', '192.168.1.5')).toBe('amd64-5');
  });

  it('should use the bare architecture without an address', () => {
    expect(hostLabel('arm64', '')).toBe('arm64');
    expect(hostLabel('arm64', 'fe80::1')).toBe('arm64');
  });
});

describe('createPlainFormatter', () => {
  it('should lay out label, time, level and message', () => {
    const format = createPlainFormatter('amd64-5');
    expect(format({ level: LogLevel.INFO, timestamp: at, message: 'hi' })).toBe('amd64-5: 03/05 14:07:09 | INFO | hi');
    expect(format({ level: LogLevel.WARNING, timestamp: at, message: 'w' })).toBe('amd64-5: 03/05 14:07:09 | WARNING | w');
  });
});

describe('createColorFormatter', () => {
  it('should paint the caller tag green and the rest in the level color', () => {
    const format = createColorFormatter('amd64');
    expect(format({ level: LogLevel.INFO, timestamp: at, message: '[open]: Open /home' })).toBe(
      '\x1b[1;31mamd64\x1b[0m: \x1b[93m03/05 14:07:09\x1b[0m | \x1b[1;97mINFO \x1b[0m | ' +
        '\x1b[1;32m[open]\x1b[0m\x1b[1;97m: Open /home\x1b[0m'
    );
  });

  it('should leave untagged messages in the level color', () => {
    const format = createColorFormatter('amd64');
    expect(format({ level: LogLevel.DEBUG, timestamp: at, message: 'plain' })).toBe(
      '\x1b[1;31mamd64\x1b[0m: \x1b[93m03/05 14:07:09\x1b[0m | \x1b[1;94mDEBUG\x1b[0m | \x1b[1;94mplain\x1b[0m'
    );
  });
});

describe('shouldColor', () => {
  it('should follow explicit modes', () => {
    expect(shouldColor('on')).toBe(true);
    expect(shouldColor('off')).toBe(false);
  });
});

describe('textOf', () => {
  it('should render absent values as empty text', () => {
    expect(textOf(undefined)).toBe('');
    expect(textOf(null)).toBe('');
    expect(textOf('')).toBe('');
  });

  it('should keep falsy scalars', () => {
    expect(textOf(0)).toBe('0');
    expect(textOf(false)).toBe('false');
  });

  it('should strip quote characters from strings', () => {
    expect(textOf('"quoted"')).toBe('quoted');
    expect(textOf("it's")).toBe("it's");
  });

  it('should render functions, dates and errors', () => {
    function open() {}
    expect(textOf(open)).toBe('open');
    expect(textOf(new Date(Date.UTC(2024, 0, 1)))).toBe('2024-01-01T00:00:00.000Z');
    expect(textOf(new TypeError('nope'))).toBe('TypeError: nope');
    expect(textOf(10n)).toBe('10');
  });

  it('should render objects as JSON', () => {
    expect(textOf({ id: 1, tags: ['a'] })).toBe('{"id":1,"tags":["a"]}');
  });
});

describe('safeJson', () => {
  it('should mark circular references', () => {
    const node: { name: string; self?: unknown } = { name: 'n' };
    node.self = node;
    expect(safeJson(node)).toBe('{"name":"n","self":"[Circular]"}');
  });

  it('should write bigints as strings', () => {
    expect(safeJson({ n: 5n })).toBe('{"n":"5"}');
  });
});
