import { describe, it, expect } from 'vitest';
import { describeCallable, docOf, document, paramsOf, parseDefault, parseParams } from './describe';

describe('parseParams', () => {
  it('should read positional parameters and literal defaults', () => {
    expect(parseParams('function add(a, b = 3) { return a + b; }')).toEqual([
      { name: 'a', kind: 'positional', index: 0, hasDefault: false },
      { name: 'b', kind: 'positional', index: 1, hasDefault: true, defaultValue: 3 },
    ]);
  });

  it('should read destructured object properties as keyword parameters', () => {
    expect(parseParams('(x, { retries = 2, label }) => x')).toEqual([
      { name: 'x', kind: 'positional', index: 0, hasDefault: false },
      { name: 'retries', kind: 'keyword', index: 1, hasDefault: true, defaultValue: 2 },
      { name: 'label', kind: 'keyword', index: 1, hasDefault: false },
    ]);
  });

  it('should use the property key, not the alias, for renamed keyword parameters', () => {
    expect(parseParams('function f({ timeout: ms = 500 } = {}) {}')).toEqual([
      { name: 'timeout', kind: 'keyword', index: 0, hasDefault: true, defaultValue: 500 },
    ]);
  });

  it('should handle bare arrows and rest parameters', () => {
    expect(parseParams('x => x * 2')).toEqual([
      { name: 'x', kind: 'positional', index: 0, hasDefault: false },
    ]);
    expect(parseParams('function f(first, ...rest) {}')).toEqual([
      { name: 'first', kind: 'positional', index: 0, hasDefault: false },
      { name: 'rest', kind: 'rest', index: 1, hasDefault: false },
    ]);
  });

  it('should skip strings and comments inside the parameter list', () => {
    expect(parseParams("function h(a /* first */, b = ')', c) {}")).toEqual([
      { name: 'a', kind: 'positional', index: 0, hasDefault: false },
      { name: 'b', kind: 'positional', index: 1, hasDefault: true, defaultValue: ')' },
      { name: 'c', kind: 'positional', index: 2, hasDefault: false },
    ]);
  });

  it('should read class constructors', () => {
    expect(parseParams("class B { constructor(name, level = 'INFO') { this.name = name; } }")).toEqual([
      { name: 'name', kind: 'positional', index: 0, hasDefault: false },
      { name: 'level', kind: 'positional', index: 1, hasDefault: true, defaultValue: 'INFO' },
    ]);
    expect(parseParams('class A { run() {} }')).toEqual([]);
  });

  it('should return an empty list for no parameters and null for native code', () => {
    expect(parseParams('function g() {}')).toEqual([]);
    expect(parseParams('function push() { [native code] }')).toBeNull();
  });
});

describe('parseDefault', () => {
  it('should turn literals into values', () => {
    expect(parseDefault('-1.5')).toBe(-1.5);
    expect(parseDefault('null')).toBeNull();
    expect(parseDefault('undefined')).toBeUndefined();
    expect(parseDefault('false')).toBe(false);
    expect(parseDefault('"x"')).toBe('x');
    expect(parseDefault('`plain`')).toBe('plain');
  });

  it('should keep other expressions as source text', () => {
    expect(parseDefault(' Date.now() ')).toBe('Date.now()');
    expect(parseDefault('`${a}`')).toBe('`${a}`');
  });
});

describe('paramsOf', () => {
  it('should read parameters from a live function', () => {
    function area(self: { w: number }, scale = 1) {
      return self.w * scale;
    }
    expect(paramsOf(area)).toEqual([
      { name: 'self', kind: 'positional', index: 0, hasDefault: false },
      { name: 'scale', kind: 'positional', index: 1, hasDefault: true, defaultValue: 1 },
    ]);
  });

  it('should return null for bound functions', () => {
    function bound(a: number) {
      return a;
    }
    expect(paramsOf(bound.bind(null))).toBeNull();
  });
});

describe('document / describeCallable', () => {
  it('should attach documentation and capture it into the descriptor', () => {
    const click = document(function click(selector: string) {
      return selector;
    }, 'Click {{selector}}');

    expect(docOf(click)).toBe('Click {{selector}}');
    expect(describeCallable(click)).toEqual({
      name: 'click',
      owner: undefined,
      placement: 'none',
      params: [{ name: 'selector', kind: 'positional', index: 0, hasDefault: false }],
      doc: 'Click {{selector}}',
    });
  });

  it('should let explicit options win', () => {
    function press() {}
    const d = describeCallable(press, { name: 'tap', placement: 'static', doc: 'Tap' });
    expect(d.name).toBe('tap');
    expect(d.placement).toBe('static');
    expect(d.doc).toBe('Tap');
  });
});
