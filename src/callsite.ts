/**
 * Same-thread call-stack accessor built on V8 stack traces.
 * Names are best effort: anonymous frames come back as undefined.
 */

/** Function name of one V8 frame line; `Class.method` yields `method`. */
export function frameName(line: string): string | undefined {
    const m = /^\s*at\s+(?:async\s+)?(?:new\s+)?(.+?)(?:\s+\[as\s+([^\]]+)\])?\s+\(/.exec(line);
    if (!m?.[1]) return undefined;
    const name = (m[2] ?? m[1]).split('.').pop() ?? '';
    if (!name || name.includes('<') || name.includes(' ')) return undefined;
    return name;
}

/**
 * Names of the frames above `below`: index 0 is whoever called `below`,
 * index 1 that function's caller, and so on. Stops at `count` entries.
 * Returns an empty list when stack traces are unavailable.
 */
export function callerNames(below: Function, count: number): (string | undefined)[] {
    const holder: { stack?: string } = {};
    const limit = Error.stackTraceLimit;
    try {
        Error.stackTraceLimit = count;
        Error.captureStackTrace(holder, below);
    } finally {
        Error.stackTraceLimit = limit;
    }
    if (typeof holder.stack !== 'string') return [];
    return holder.stack
        .split('\n')
        .slice(1)
        .map(frameName);
}
