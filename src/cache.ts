/**
 * Keyed singleton cache: one live instance per (type, constructor-argument text)
 * @module cache
 */

import { InstanceCacheError } from './errors';

/** Any class the cache can construct */
export type Constructor<T, A extends unknown[]> = new (...args: A) => T;

/** Minimal weak handle; `WeakRef` satisfies it */
export interface Ref<T> {
    deref(): T | undefined;
}

export interface InstanceCacheOptions {
    /**
     * Builds the weak handle for a fresh instance.
     * Default: `new WeakRef(instance)`.
     */
    makeRef?: <T extends object>(instance: T) => Ref<T>;
}

/**
 * Derive the cache key: positional arguments in order, then keyword entries
 * in iteration order, concatenated without a separator.
 * Tuples that stringify identically share a key.
 *
 * @example
 * ```typescript
 * deriveKey([1, 'a'], { level: 2 }); // "1alevel=2"
 * ```
 */
export const deriveKey = (args: readonly unknown[], kwargs?: Record<string, unknown>): string => {
    const positional = args.map((a) => String(a)).join('');
    const keyword = kwargs
        ? Object.entries(kwargs).map(([k, v]) => `${k}=${String(v)}`).join('')
        : '';
    return positional + keyword;
};

/**
 * Memoizes constructed instances per type and key, holding them weakly.
 *
 * An entry lives only as long as some other owner keeps the instance;
 * after collection the entry is dropped and the next call constructs anew.
 *
 * @example
 * ```typescript
 * const cache = new InstanceCache();
 * const a = cache.getOrCreate(Session, ['alpha']);
 * const b = cache.getOrCreate(Session, ['alpha']);
 * a === b; // true while `a` is held
 * ```
 */
export class InstanceCache {
    private spaces = new WeakMap<Function, Map<string, Ref<object>>>();
    private readonly pending = new WeakMap<Function, Set<string>>();
    private readonly makeRef: <T extends object>(instance: T) => Ref<T>;
    private readonly registry: FinalizationRegistry<{ space: Map<string, Ref<object>>; key: string; ref: Ref<object> }>;

    constructor(options: InstanceCacheOptions = {}) {
        this.makeRef = options.makeRef ?? (<T extends object>(instance: T): Ref<T> => new WeakRef(instance));
        // Drop the entry only if it still points at the collected instance
        this.registry = new FinalizationRegistry(({ space, key, ref }) => {
            if (space.get(key) === ref) space.delete(key);
        });
    }

    /**
     * Return the live instance for `type` and the key derived from the
     * arguments, constructing one when there is none.
     *
     * Lookup and insert form one synchronous section, so concurrent async
     * callers with the same key see a single construction.
     *
     * @throws InstanceCacheError when the constructor re-enters the cache for its own key
     */
    getOrCreate<T extends object, A extends unknown[]>(
        type: Constructor<T, A>,
        args: A,
        kwargs?: Record<string, unknown>
    ): T {
        const key = deriveKey(args, kwargs);
        const space = this.spaceOf(type);

        const live = this.lookup(space, key);
        if (live instanceof type) return live;

        const building = this.pending.get(type) ?? new Set<string>();
        this.pending.set(type, building);
        if (building.has(key)) {
            throw new InstanceCacheError(`Re-entrant construction of ${type.name} for key "${key}"`, key);
        }
        building.add(key);
        try {
            const instance = new type(...args);
            const ref = this.makeRef(instance);
            space.set(key, ref);
            this.registry.register(instance, { space, key, ref });
            return instance;
        } finally {
            building.delete(key);
        }
    }

    /**
     * Number of keys currently held for `type`, counting only live instances
     */
    size(type: Function): number {
        const space = this.spaces.get(type);
        if (!space) return 0;
        let n = 0;
        for (const [key, ref] of space) {
            if (ref.deref() === undefined) space.delete(key);
            else n++;
        }
        return n;
    }

    /**
     * Forget every entry for `type`, or for all types when omitted.
     * Instances stay alive as long as their owners hold them.
     */
    clear(type?: Function): void {
        if (type) {
            this.spaces.get(type)?.clear();
            return;
        }
        this.spaces = new WeakMap();
    }

    private spaceOf(type: Function): Map<string, Ref<object>> {
        let space = this.spaces.get(type);
        if (!space) {
            space = new Map();
            this.spaces.set(type, space);
        }
        return space;
    }

    private lookup(space: Map<string, Ref<object>>, key: string): object | undefined {
        const ref = space.get(key);
        if (!ref) return undefined;
        const instance = ref.deref();
        if (instance === undefined) {
            space.delete(key);
            return undefined;
        }
        return instance;
    }
}

/** Process-wide cache used by `keyed()` and the sink configuration */
export const defaultCache = new InstanceCache();

/**
 * Bind a type to a cache: calling the factory behaves like a constructor
 * that hands back the live instance for equal arguments.
 *
 * @example
 * ```typescript
 * const session = keyed(Session);
 * session('alpha') === session('alpha'); // true
 * ```
 */
export const keyed = <T extends object, A extends unknown[]>(
    type: Constructor<T, A>,
    cache: InstanceCache = defaultCache
): ((...args: A) => T) => (...args: A) => cache.getOrCreate(type, args);
