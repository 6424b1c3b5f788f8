// src/config.ts
// Process-wide settings for the facade and the class instrumentor.
// - Explicit overrides win, then the environment bag, then defaults.
// - Read-only once resolved; swap the whole value with setConfig().

import { arch, networkInterfaces } from 'node:os';
import { LogLevel, type MatchPolicy, type TraceConfig } from './types';

type Env = Record<string, string | undefined>;

/* -------------------------------- Defaults --------------------------------- */

export const DEFAULT_STARTSWITH: readonly string[] = Object.freeze(['Assert']);
export const DEFAULT_ENDSWITH: readonly string[] = Object.freeze(['Widget', 'Method']);
export const DEFAULT_CONTAIN: readonly string[] = Object.freeze(['ShortCut']);

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Resolve a string into a `LogLevel`.
 * Accepts: 'DEBUG'|'INFO'|'WARNING'|'WARN'|'ERROR' or a 0..3 number as string.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseLogLevel(s?: string): LogLevel | undefined {
    if (!s) return undefined;
    switch (s.trim().toUpperCase())
    {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN':
        case 'WARNING': return LogLevel.WARNING;
        case 'ERROR': return LogLevel.ERROR;
    }
    const n = Number(s);
    if (!Number.isInteger(n)) return undefined;
    const clamped = Math.max(LogLevel.DEBUG, Math.min(LogLevel.ERROR, n));
    return clamped === LogLevel.DEBUG ? LogLevel.DEBUG
        : clamped === LogLevel.INFO ? LogLevel.INFO
        : clamped === LogLevel.WARNING ? LogLevel.WARNING
        : LogLevel.ERROR;
}

/**
 * Resolve the base level in the following order:
 * 1) Explicit level
 * 2) `DEBUG_MODE=1|true|yes|on` → DEBUG
 * 3) `LOG_LEVEL=<DEBUG|INFO|WARNING|ERROR|0..3>`
 * 4) INFO
 */
function resolveLevel(explicit: LogLevel | undefined, env: Env): LogLevel {
    if (explicit != null) return explicit;

    const dm = env.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return LogLevel.DEBUG;

    return parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO;
}

/** Comma-separated list; blanks dropped. Undefined when the variable is unset. */
function parseList(s?: string): string[] | undefined {
    if (s == null) return undefined;
    return s.split(',').map(p => p.trim()).filter(p => p.length > 0);
}

/** First non-internal IPv4 address of this host, or '' when there is none. */
export function detectHostIp(): string {
    const ifaces = networkInterfaces();
    for (const name of Object.keys(ifaces)) {
        for (const info of ifaces[name] ?? []) {
            if (info.family === 'IPv4' && !info.internal) return info.address;
        }
    }
    return '';
}

/* --------------------------------- Resolve --------------------------------- */

/**
 * Build a config from explicit values, the environment and defaults.
 * `env` defaults to `process.env`; pass a bag in tests.
 */
export function resolveConfig(overrides: Partial<TraceConfig> = {}, env: Env = process.env): TraceConfig {
    return Object.freeze({
        CLASS_NAME_STARTSWITH: overrides.CLASS_NAME_STARTSWITH ?? parseList(env.CLASS_NAME_STARTSWITH) ?? DEFAULT_STARTSWITH,
        CLASS_NAME_ENDSWITH:   overrides.CLASS_NAME_ENDSWITH   ?? parseList(env.CLASS_NAME_ENDSWITH)   ?? DEFAULT_ENDSWITH,
        CLASS_NAME_CONTAIN:    overrides.CLASS_NAME_CONTAIN    ?? parseList(env.CLASS_NAME_CONTAIN)    ?? DEFAULT_CONTAIN,
        LOG_LEVEL:     resolveLevel(overrides.LOG_LEVEL, env),
        LOG_FILE_PATH: overrides.LOG_FILE_PATH ?? env.LOG_FILE_PATH?.trim() ?? process.cwd(),
        HOST_IP:       overrides.HOST_IP ?? env.HOST_IP?.trim() ?? detectHostIp(),
        SYS_ARCH:      overrides.SYS_ARCH ?? env.SYS_ARCH?.trim() ?? arch(),
    });
}

/** The class-name rules of a config, in the shape the instrumentor takes. */
export function policyOf(config: TraceConfig): MatchPolicy {
    return {
        startsWith: config.CLASS_NAME_STARTSWITH,
        endsWith: config.CLASS_NAME_ENDSWITH,
        contains: config.CLASS_NAME_CONTAIN,
    };
}

let current: TraceConfig | undefined;

/** Process-wide config, resolved from the environment on first use. */
export function getConfig(): TraceConfig {
    if (!current) current = resolveConfig();
    return current;
}

/** Replace the process-wide config. Passing nothing re-resolves on next use. */
export function setConfig(config?: TraceConfig): void {
    current = config;
}
