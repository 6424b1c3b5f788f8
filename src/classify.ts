import type { CallableDescriptor, CallableKind, ParamDescriptor } from './types';

/** Parameter names that conventionally stand for the receiving object. */
export const RECEIVER_NAMES: ReadonlySet<string> = new Set(['self']);

const positional = (params: readonly ParamDescriptor[]): ParamDescriptor[] =>
    params.filter((p) => p.kind === 'positional');

/**
 * Decide how a callable was meant to be invoked, from its declared
 * parameters and the receiver of the current call. Never throws; anything
 * that cannot be introspected is a plain function.
 *
 * 1. unknown parameters                      → function
 * 2. declared on a prototype                 → instance (receiver is `this`)
 * 3. first positional parameter is `self`    → instance (receiver is argument 0)
 * 4. static member without positional params → static
 * 5. static member called through its type   → class, otherwise static
 * 6. anything else                           → function
 */
export function classify(descriptor: CallableDescriptor, receiver?: unknown): CallableKind {
    const { params, placement, owner } = descriptor;
    if (!params) return 'function';
    if (placement === 'prototype') return 'instance';

    const declared = positional(params);
    const first = declared[0];
    if (first && first.index === 0 && RECEIVER_NAMES.has(first.name)) return 'instance';

    if (placement === 'static') {
        if (declared.length === 0) return 'static';
        return receiver !== undefined && receiver === owner ? 'class' : 'static';
    }
    return 'function';
}

/**
 * How many leading call-site arguments are the receiver: 1 when the
 * receiver is passed explicitly as a `self` parameter, otherwise 0.
 */
export function receiverArgCount(kind: CallableKind, descriptor: CallableDescriptor): number {
    if (kind !== 'instance' || descriptor.placement === 'prototype' || !descriptor.params) return 0;
    const first = descriptor.params[0];
    return first && first.kind === 'positional' && RECEIVER_NAMES.has(first.name) ? 1 : 0;
}

/**
 * Parameters left after the receiver, re-indexed against the stripped argument list.
 */
export function withoutReceiver(params: readonly ParamDescriptor[], count: number): ParamDescriptor[] {
    if (count === 0) return [...params];
    return params
        .filter((p) => p.index >= count)
        .map((p) => ({ ...p, index: p.index - count }));
}
