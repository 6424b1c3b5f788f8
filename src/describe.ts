// src/describe.ts
// Registration-time capture of a callable's shape.
// - Parameters are read once from the source text (names, kinds, defaults).
// - Documentation is registered explicitly; JS keeps no doc comments at runtime.

import type { CallableDescriptor, ParamDescriptor, Placement } from './types';

/* ------------------------------ Documentation ------------------------------ */

const docs = new WeakMap<Function, string>();

/**
 * Attach documentation (a title template) to a function.
 * Returns the function so it can wrap a definition in place.
 *
 * @example
 * ```typescript
 * document(Calculator.prototype.add, 'Adds {{a}} and {{b}}\n@param a first\n@param b second');
 * ```
 */
export function document<F extends Function>(fn: F, doc: string): F {
    docs.set(fn, doc);
    return fn;
}

/** Documentation registered for `fn`, if any. */
export function docOf(fn: Function): string | undefined {
    return docs.get(fn);
}

/* ------------------------------ Source parsing ----------------------------- */

const paramCache = new WeakMap<Function, readonly ParamDescriptor[] | null>();

/**
 * Split `src` at top-level commas, starting right after the bracket at `open`
 * and stopping at its partner. Strings, template literals and comments are skipped.
 * Returns null when the bracket never closes.
 */
function splitTopLevel(src: string, open: number): string[] | null {
    const parts: string[] = [];
    let depth = 0;
    let start = open + 1;
    for (let i = open + 1; i < src.length; i++) {
        const c = src[i];
        if (c === '"' || c === "'" || c === '`') {
            i = skipString(src, i);
            continue;
        }
        if (c === '/' && src[i + 1] === '*') {
            const end = src.indexOf('*/', i + 2);
            if (end < 0) return null;
            i = end + 1;
            continue;
        }
        if (c === '/' && src[i + 1] === '/') {
            const end = src.indexOf('\n', i + 2);
            if (end < 0) return null;
            i = end;
            continue;
        }
        if (c === '(' || c === '[' || c === '{') depth++;
        else if (c === ')' || c === ']' || c === '}') {
            if (depth === 0) {
                parts.push(src.slice(start, i));
                return parts;
            }
            depth--;
        } else if (c === ',' && depth === 0) {
            parts.push(src.slice(start, i));
            start = i + 1;
        }
    }
    return null;
}

/** Index of the closing quote of the string starting at `i`. */
function skipString(src: string, i: number): number {
    const quote = src[i];
    for (let j = i + 1; j < src.length; j++) {
        if (src[j] === '\\') { j++; continue; }
        if (src[j] === quote) return j;
    }
    return src.length;
}

/** Position of the first top-level `=` in a parameter, or -1. Skips `=>` and comparisons. */
function defaultSplit(text: string): number {
    let depth = 0;
    for (let i = 0; i < text.length; i++) {
        const c = text[i];
        if (c === '"' || c === "'" || c === '`') { i = skipString(text, i); continue; }
        if (c === '(' || c === '[' || c === '{') depth++;
        else if (c === ')' || c === ']' || c === '}') depth--;
        else if (c === '=' && depth === 0 && text[i + 1] !== '=' && text[i + 1] !== '>') return i;
    }
    return -1;
}

const stripComments = (s: string): string => s.replace(/\/\*[\s\S]*?\*\//g, '').replace(/\/\/[^\n]*/g, '').trim();

/**
 * Literal defaults become values; anything else keeps its source text.
 */
export function parseDefault(text: string): unknown {
    const t = text.trim();
    if (t === 'undefined') return undefined;
    if (t === 'null') return null;
    if (t === 'true') return true;
    if (t === 'false') return false;
    if (/^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(t)) return Number(t);
    const q = t[0];
    if ((q === '"' || q === "'" || (q === '`' && !t.includes('${'))) && t.length >= 2 && t[t.length - 1] === q) {
        return t.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    return t;
}

function describeParam(raw: string, index: number): ParamDescriptor[] {
    const text = stripComments(raw);
    if (!text) return [];
    if (text.startsWith('...')) {
        const name = text.slice(3).trim();
        return /^[\w$]+$/.test(name) ? [{ name, kind: 'rest', index, hasDefault: false }] : [];
    }
    const eq = defaultSplit(text);
    const target = (eq < 0 ? text : text.slice(0, eq)).trim();
    if (target.startsWith('{')) {
        const entries = splitTopLevel(target, 0) ?? [];
        return entries.flatMap((entry) => describeKeyword(entry, index));
    }
    if (!/^[\w$]+$/.test(target)) return []; // array pattern: no name to bind
    return eq < 0
        ? [{ name: target, kind: 'positional', index, hasDefault: false }]
        : [{ name: target, kind: 'positional', index, hasDefault: true, defaultValue: parseDefault(text.slice(eq + 1)) }];
}

function describeKeyword(raw: string, index: number): ParamDescriptor[] {
    const text = stripComments(raw);
    if (!text || text.startsWith('...')) return [];
    const eq = defaultSplit(text);
    const head = eq < 0 ? text : text.slice(0, eq);
    const name = head.split(':')[0]?.trim().replace(/^['"]|['"]$/g, '') ?? '';
    if (!/^[\w$]+$/.test(name)) return [];
    return eq < 0
        ? [{ name, kind: 'keyword', index, hasDefault: false }]
        : [{ name, kind: 'keyword', index, hasDefault: true, defaultValue: parseDefault(text.slice(eq + 1)) }];
}

/** Where the parameter list opens in a function's (or class's) source, or -1. */
function paramListStart(src: string): number {
    if (/^class\b/.test(src)) {
        const m = /\bconstructor\s*\(/.exec(src);
        return m ? m.index + m[0].length - 1 : -1;
    }
    return src.indexOf('(');
}

/**
 * Parameters declared by `fn`, read from its source text.
 * Returns null when the source is unavailable (native or bound functions).
 *
 * Plain identifiers are positional, properties of a destructured object
 * parameter are keyword parameters, and `...rest` collects the remainder.
 */
export function paramsOf(fn: Function): readonly ParamDescriptor[] | null {
    if (paramCache.has(fn)) return paramCache.get(fn) ?? null;
    let result: readonly ParamDescriptor[] | null;
    try {
        result = parseParams(Function.prototype.toString.call(fn));
    } catch {
        result = null;
    }
    paramCache.set(fn, result);
    return result;
}

export function parseParams(src: string): readonly ParamDescriptor[] | null {
    if (src.includes('[native code]')) return null;
    if (/^class\b/.test(src) && !/\bconstructor\s*\(/.test(src)) return [];

    // Bare single-parameter arrow: `x => ...` or `async x => ...`
    const arrow = /^(?:async\s+)?([\w$]+)\s*=>/.exec(src);
    if (arrow?.[1]) return [{ name: arrow[1], kind: 'positional', index: 0, hasDefault: false }];

    const open = paramListStart(src);
    if (open < 0) return null;
    const raw = splitTopLevel(src, open);
    if (!raw) return null;
    if (raw.length === 1 && stripComments(raw[0] ?? '') === '') return [];
    return Object.freeze(raw.flatMap((p, i) => describeParam(p, i)));
}

/* -------------------------------- Descriptor ------------------------------- */

export interface DescribeOptions {
    name?: string;
    owner?: Function;
    placement?: Placement;
    doc?: string;
}

/**
 * Capture a descriptor for `fn`. Explicit options win over what is read from `fn`.
 */
export function describeCallable(fn: Function, options: DescribeOptions = {}): CallableDescriptor {
    return Object.freeze({
        name: options.name ?? fn.name,
        owner: options.owner,
        placement: options.placement ?? 'none',
        params: paramsOf(fn),
        doc: options.doc ?? docOf(fn),
    });
}
