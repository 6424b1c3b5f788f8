// src/instrument.ts
// Class instrumentor: wraps the public methods of classes whose declaring
// name matches the configured rules. Applying it again changes nothing.

import { getConfig, policyOf } from './config';
import { docOf } from './describe';
import { debug } from './logger';
import type { StepReporter } from './steps';
import { isInternalName } from './title';
import { isCallable, isInstrumented, trace, type AnyFunction } from './tracer';
import type { MatchPolicy, Placement } from './types';

export interface InstrumentOptions {
    /** Class-name rules. Default: the CLASS_NAME_* lists of the process-wide config */
    policy?: MatchPolicy;
    /** Documentation per member name; wins over `document()` registrations */
    docs?: Readonly<Record<string, string>>;
    /** Step reporter for every wrapped member. Default: the process-wide one */
    steps?: StepReporter;
}

/** Static-side keys every class has; never members. */
const STATIC_BUILTINS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

/**
 * True when `className` starts with any prefix, ends with any suffix,
 * or contains any substring of the policy.
 */
export function matchesPolicy(className: string, policy: MatchPolicy): boolean {
    return policy.startsWith.some((p) => className.startsWith(p))
        || policy.endsWith.some((s) => className.endsWith(s))
        || policy.contains.some((c) => className.includes(c));
}

const isClassSource = (fn: Function): boolean => /^class\b/.test(Function.prototype.toString.call(fn));

/** Name of the class that declares `proto`, falling back to `fallback`. */
function declaringName(proto: object, fallback: string): string {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : fallback;
}

interface Candidate {
    key: string;
    fn: AnyFunction;
    owner: Function;
    declaring: string;
    placement: Placement;
    descriptor: PropertyDescriptor;
}

/**
 * Walk `start` and its prototype chain up to `stop`, yielding the nearest
 * definition of every function-valued data member.
 */
function* members(start: object, stop: object, placement: Placement, type: Function): Generator<Candidate> {
    const seen = new Set<string>();
    for (let level: object | null = start; level && level !== stop; level = Object.getPrototypeOf(level)) {
        // statics are invoked through the instrumented type, inherited or not
        const owner: unknown = placement === 'static' ? type : Reflect.get(level, 'constructor');
        for (const key of Object.getOwnPropertyNames(level)) {
            if (seen.has(key)) continue;
            seen.add(key);
            if (key === 'constructor' || (placement === 'static' && STATIC_BUILTINS.has(key))) continue;
            const descriptor = Object.getOwnPropertyDescriptor(level, key);
            if (!descriptor || !('value' in descriptor) || !isCallable(descriptor.value)) continue;
            if (isClassSource(descriptor.value) || typeof owner !== 'function') continue;
            const declaring = placement === 'static'
                ? (typeof level === 'function' && level.name) || type.name
                : declaringName(level, type.name);
            yield { key, fn: descriptor.value, owner, declaring, placement, descriptor };
        }
    }
}

/**
 * Wrap every public, not yet instrumented method of `type` whose declaring
 * class matches the policy. Mutates and returns `type`.
 *
 * Inherited methods are installed as own members of `type`, leaving base
 * classes untouched. Names starting with `_` are skipped.
 *
 * @example
 * ```typescript
 * class AssertPage {
 *   open(path: string) { ... }
 * }
 * instrument(AssertPage, { docs: { open: 'Open {{path}}' } });
 * new AssertPage().open('/home'); // "[open]: Open /home"
 * ```
 */
export function instrument<C extends Function>(type: C, options: InstrumentOptions = {}): C {
    const policy = options.policy ?? policyOf(getConfig());
    const proto: unknown = Reflect.get(type, 'prototype');

    const sides: Array<[object, object, Placement]> = [[type, Function.prototype, 'static']];
    if (proto !== null && typeof proto === 'object') sides.push([proto, Object.prototype, 'prototype']);

    for (const [start, stop, placement] of sides) {
        for (const m of members(start, stop, placement, type)) {
            if (isInternalName(m.key) || isInstrumented(m.fn)) continue;
            if (!matchesPolicy(m.declaring, policy)) continue;
            if (!m.descriptor.writable && !m.descriptor.configurable) continue;

            const wrapped = trace(m.fn, {
                name: m.key,
                owner: m.owner,
                placement: m.placement,
                doc: options.docs && Object.hasOwn(options.docs, m.key) ? options.docs[m.key] : docOf(m.fn),
                steps: options.steps,
            });
            Object.defineProperty(start, m.key, {
                value: wrapped,
                writable: m.descriptor.writable,
                enumerable: m.descriptor.enumerable,
                configurable: m.descriptor.configurable,
            });
            debug(`${m.declaring}.${m.key} instrumented`);
        }
    }
    return type;
}
