/**
 * Error classes raised by the tracing layer itself.
 * Failures of traced callables are never wrapped; they propagate as thrown.
 */

/**
 * Thrown when a constructor asks the instance cache for its own key
 * while that key is still being constructed.
 *
 * @example
 * ```typescript
 * try {
 *   cache.getOrCreate(Session, ['alpha']);
 * } catch (error) {
 *   if (error instanceof InstanceCacheError) {
 *     console.log(`Re-entrant construction of ${error.key}`);
 *   }
 * }
 * ```
 */
export class InstanceCacheError extends Error {
    /** The cache key whose construction was re-entered */
    public readonly key: string;

    constructor(message: string, key: string) {
        super(message);
        this.name = 'InstanceCacheError';
        this.key = key;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, InstanceCacheError);
        }
    }
}

/**
 * Thrown when the log directory or one of the log files cannot be created.
 */
export class SinkConfigError extends Error {
    /** Path that could not be created */
    public readonly path: string;

    constructor(message: string, path: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SinkConfigError';
        this.path = path;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SinkConfigError);
        }
    }
}
