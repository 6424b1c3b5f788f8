import { format as formatDate } from 'date-fns';
import { LEVEL_NAMES, LogLevel, type LogEntry } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode   = 'auto' | 'on' | 'off';

/** Turns one entry into one display line (without the trailing newline). */
export type LineFormatter = (entry: LogEntry) => string;

const CSI = '\x1b[';
const colors = {
    boldRed:    (s: string) => `${CSI}1;31m${s}${CSI}0m`,
    boldGreen:  (s: string) => `${CSI}1;32m${s}${CSI}0m`,
    boldYellow: (s: string) => `${CSI}1;33m${s}${CSI}0m`,
    boldBlue:   (s: string) => `${CSI}1;94m${s}${CSI}0m`,
    boldWhite:  (s: string) => `${CSI}1;97m${s}${CSI}0m`,
    yellow:     (s: string) => `${CSI}93m${s}${CSI}0m`,
};

const levelColor: Record<LogLevel, (s: string) => string> = {
    [LogLevel.DEBUG]:   colors.boldBlue,
    [LogLevel.INFO]:    colors.boldWhite,
    [LogLevel.WARNING]: colors.boldYellow,
    [LogLevel.ERROR]:   colors.boldRed,
};

export const DATE_FORMAT = 'MM/dd HH:mm:ss';

/* ------------------------------- Formatters -------------------------------- */

/**
 * `<arch>[-<ip-suffix>]` prefix of every line.
 * The suffix is the last octet of an IPv4 address and is omitted otherwise.
 */
export function hostLabel(sysArch: string, hostIp: string): string {
    const m = /\d+\.\d+\.\d+\.(\d+)/.exec(hostIp);
    return m ? `${sysArch}-${m[1]}` : sysArch;
}

/** `<label>: <MM/dd HH:mm:ss> | <LEVEL> | <message>` */
export function createPlainFormatter(label: string): LineFormatter {
    return (entry) =>
        `${label}: ${formatDate(entry.timestamp, DATE_FORMAT)} | ${LEVEL_NAMES[entry.level]} | ${entry.message}`;
}

/**
 * Same layout as the plain formatter, with ANSI colors:
 * label bold red, timestamp yellow, level and message in the level's color,
 * and a leading `[name]` tag in bold green.
 */
export function createColorFormatter(label: string): LineFormatter {
    return (entry) => {
        const paint = levelColor[entry.level];
        // INFO is padded so the columns line up with DEBUG/ERROR
        const name = entry.level === LogLevel.INFO ? 'INFO ' : LEVEL_NAMES[entry.level];
        const m = /^(\[[^\]\s]*\])?([\s\S]*)$/.exec(entry.message);
        const tag = m?.[1] ? colors.boldGreen(m[1]) : '';
        const rest = m?.[2] ?? entry.message;
        return `${colors.boldRed(label)}: ${colors.yellow(formatDate(entry.timestamp, DATE_FORMAT))} | ${paint(name)} | ${tag}${rest ? paint(rest) : ''}`;
    };
}

/** Color is auto by default: on for a TTY outside production. */
export function shouldColor(mode: ColorMode = 'auto'): boolean {
    if (mode !== 'auto') return mode === 'on';
    return !!process.stdout.isTTY && process.env.NODE_ENV !== 'production';
}

/* ----------------------------- Format helpers ------------------------------ */

export function safeJson(data: unknown): string {
    const seen = new WeakSet<object>();
    try {
        const out = JSON.stringify(data, (_k, v: unknown) => {
            if (typeof v === 'bigint') return v.toString();
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
        return out ?? String(data);
    } catch {
        try { return String(data); } catch { return '[Unserializable]'; }
    }
}

/**
 * Text form of a call-site value as it appears in titles and step parameters.
 * - absent (`undefined`/`null`) and empty strings → ''
 * - strings lose surrounding quote characters
 * - plain objects and arrays → JSON
 */
export function textOf(value: unknown): string {
    if (value === undefined || value === null) return '';
    switch (typeof value) {
        case 'string': return value.replace(/^['"]+|['"]+$/g, '');
        case 'number':
        case 'boolean':
        case 'bigint':
        case 'symbol': return value.toString();
        case 'function': return value.name || '<anonymous>';
    }
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    if (value instanceof Error) return `${value.name}: ${value.message}`;
    return safeJson(value);
}
