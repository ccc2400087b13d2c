import type { LogEntry } from './types';
import { TRUNCATION_MARKER } from './constants';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode = 'auto' | 'on' | 'off';

export type EntryFormatter = (entry: LogEntry) => string;

const CSI = '\x1b[';
const colors = {
    red:    (s: string) => `${CSI}31m${s}${CSI}39m`,
    yellow: (s: string) => `${CSI}33m${s}${CSI}39m`,
    cyan:   (s: string) => `${CSI}36m${s}${CSI}39m`,
    dim:    (s: string) => `${CSI}2m${s}${CSI}22m`,
};

const ENTRY_FIELDS = new Set(['level', 'timestamp', 'logger', 'message']);

/* ------------------------------- Formatters -------------------------------- */

/**
 * Line formatter: `[timestamp] LEVEL logger message {extra fields}`.
 * Color is used with 'on', or with 'auto' on a TTY outside production.
 */
export function createConsoleFormatter(
    color: ColorMode = 'auto',
    env: Record<string, string | undefined> = process.env,
): EntryFormatter {
    const useColor = color === 'on'
        || (color === 'auto' && process.stdout.isTTY === true && env.NODE_ENV !== 'production');

    return (entry) => {
        let prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.logger}`;
        if (useColor) {
            if (entry.level === 'error' || entry.level === 'fatal') prefix = colors.red(prefix);
            else if (entry.level === 'warn') prefix = colors.yellow(prefix);
            else if (entry.level === 'debug') prefix = colors.cyan(prefix);
            else prefix = colors.dim(prefix);
        }
        const extra: Record<string, unknown> = {};
        let hasExtra = false;
        for (const key of Object.keys(entry)) {
            if (ENTRY_FIELDS.has(key)) continue;
            extra[key] = entry[key];
            hasExtra = true;
        }
        return hasExtra ? `${prefix} ${entry.message} ${repr(extra)}` : `${prefix} ${entry.message}`;
    };
}

/* ----------------------------- Representations ----------------------------- */

/**
 * Single-line rendering of any value for log messages. Never throws.
 */
export function repr(value: unknown): string {
    if (value === undefined) return 'undefined';
    if (typeof value === 'function') return describeFunction(value);
    if (typeof value === 'bigint') return `${value}n`;

    const seen = new WeakSet<object>();
    try {
        const out = JSON.stringify(value, (_key: string, v: unknown) => {
            if (typeof v === 'bigint') return `${v}n`;
            if (typeof v === 'function') return describeFunction(v);
            if (v instanceof Error) return { name: v.name, message: v.message };
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
        return out ?? String(value);
    } catch {
        try { return String(value); } catch { return '[Unrepresentable]'; }
    }
}

/**
 * Cut `text` so that it fits in `max` characters, the truncation marker included.
 * A surrogate pair is never split.
 */
export function capRepr(text: string, max: number): string {
    if (text.length <= max) return text;
    const keep = max - TRUNCATION_MARKER.length;
    if (keep <= 0) return TRUNCATION_MARKER.slice(0, Math.max(0, max));
    let end = keep;
    const last = text.charCodeAt(end - 1);
    if (last >= 0xd800 && last <= 0xdbff) end--;
    return text.slice(0, end) + TRUNCATION_MARKER;
}

function describeFunction(fn: Function): string {
    return `[Function ${fn.name || 'anonymous'}]`;
}
