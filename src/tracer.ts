// src/tracer.ts
// Call tracer: one INFO line per call, `[name]: <rendered title>`,
// plus an optional step around the call. Outcomes pass through untouched.

import { classify, receiverArgCount, withoutReceiver } from './classify';
import { describeCallable, type DescribeOptions } from './describe';
import { textOf } from './format';
import { info, warning } from './logger';
import { getStepReporter, type StepReporter } from './steps';
import { bindArguments, isInternalName, renderParams, renderTitle } from './title';
import type { CallableDescriptor } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type AnyFunction<This = unknown, A extends unknown[] = unknown[], R = unknown> = (this: This, ...args: A) => R;

export interface TraceOptions extends DescribeOptions {
    /** Reporter for this callable. Default: the process-wide one, read at call time */
    steps?: StepReporter;
}

interface RenderedCall {
    title: string;
    params: Record<string, string>;
}

/* ---------------------------------- Marks ---------------------------------- */

const originals = new WeakMap<Function, Function>();

/** True when `fn` is a wrapper produced by this module. */
export const isInstrumented = (fn: unknown): boolean => typeof fn === 'function' && originals.has(fn);

/** The function a wrapper calls through to; `fn` itself when not wrapped. */
export function unwrap(fn: Function): Function {
    return originals.get(fn) ?? fn;
}

export const isCallable = (v: unknown): v is AnyFunction => typeof v === 'function';

/** Keep the original's `name` and `length` on the wrapper and mark it. */
function adopt(wrapped: Function, original: Function, name: string): void {
    Object.defineProperty(wrapped, 'name', { value: name, configurable: true });
    Object.defineProperty(wrapped, 'length', { value: original.length, configurable: true });
    originals.set(wrapped, original);
}

/* --------------------------------- Render ---------------------------------- */

/**
 * Title and text parameters for one call. The receiver, whether `this` or an
 * explicit `self` argument, never reaches the bindings.
 */
export function renderCall(descriptor: CallableDescriptor, receiver: unknown, args: readonly unknown[]): RenderedCall {
    const kind = classify(descriptor, receiver);
    const strip = receiverArgCount(kind, descriptor);
    const params = withoutReceiver(descriptor.params ?? [], strip);
    const bindings = bindArguments(params, args.slice(strip));
    return { title: renderTitle(descriptor, bindings), params: renderParams(bindings) };
}

function tryRender(descriptor: CallableDescriptor, receiver: unknown, args: readonly unknown[]): RenderedCall | undefined {
    try {
        return renderCall(descriptor, receiver, args);
    } catch (e) {
        warning(`[${descriptor.name}]: title unavailable, calling untraced (${textOf(e)})`);
        return undefined;
    }
}

/* ---------------------------------- Trace ---------------------------------- */

/**
 * Wrap `fn` so every call logs its rendered title and runs inside a step.
 * The descriptor is captured once, here.
 *
 * - names starting with `_` call straight through
 * - the original receives the unmodified `this` and arguments
 * - a thrown error or rejected promise propagates unchanged; the step is
 *   closed with it first
 *
 * @example
 * ```typescript
 * const add = trace(document((a: number, b: number) => a + b, 'Adds {{a}} and {{b}}'), { name: 'add' });
 * add(2, 3); // logs "[add]: Adds 2 and 3"
 * ```
 */
export function trace<This, A extends unknown[], R>(
    fn: AnyFunction<This, A, R>,
    options: TraceOptions = {}
): AnyFunction<This, A, R> {
    const descriptor = describeCallable(fn, options);
    const name = descriptor.name;

    const wrapped = function (this: This, ...args: A): R {
        if (isInternalName(name)) return fn.apply(this, args);

        const call = tryRender(descriptor, this, args);
        if (!call) return fn.apply(this, args);

        info(`[${name}]: ${call.title}`, { autoPrefix: false });

        const scope = (options.steps ?? getStepReporter()).open(call.title, call.params);
        let result: R;
        try {
            result = fn.apply(this, args);
        } catch (e) {
            scope.close(e);
            throw e;
        }
        // Only native promises are awaited; `then` on other thenables may start their work
        if (result instanceof Promise) {
            void result.then(() => scope.close(), (e: unknown) => scope.close(e));
        } else {
            scope.close();
        }
        return result;
    };

    adopt(wrapped, fn, name);
    return wrapped;
}

/**
 * Trace construction of `type`. Each `new` logs `[constructor]: <title>`;
 * no step is opened and no receiver is stripped.
 * Returns a proxy; `instanceof` and static members behave as on `type`.
 */
export function traceConstructor<C extends abstract new (...args: never[]) => object>(
    type: C,
    options: Omit<DescribeOptions, 'placement'> = {}
): C {
    const descriptor = describeCallable(type, { name: 'constructor', owner: type, ...options, placement: 'none' });
    return new Proxy(type, {
        construct(target, args, newTarget) {
            const bindings = bindArguments(descriptor.params ?? [], args);
            info(`[${descriptor.name}]: ${renderTitle(descriptor, bindings)}`, { autoPrefix: false });
            return Reflect.construct(target, args, newTarget);
        },
    });
}
