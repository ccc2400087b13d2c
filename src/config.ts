import { LogLevel } from './types';

export type Env = Record<string, string | undefined>;

/** Forces DEBUG as the fallback level when set to 1|true|yes|on */
export const DEBUG_ENV_VAR = 'HMCCLIENT_DEBUG';

/** debug|info|warn|error|fatal|silent or 0..5 */
export const LEVEL_ENV_VAR = 'HMCCLIENT_LOG_LEVEL';

/**
 * Parse a level name or number. Returns `undefined` if unparsable;
 * callers decide the fallback.
 */
export function parseLogLevel(s?: string): LogLevel | undefined {
    if (!s) return undefined;
    switch (s.trim().toLowerCase()) {
        case 'debug': return LogLevel.DEBUG;
        case 'info': return LogLevel.INFO;
        case 'warn':
        case 'warning': return LogLevel.WARN;
        case 'error': return LogLevel.ERROR;
        case 'fatal': return LogLevel.FATAL;
        case 'silent':
        case 'none': return LogLevel.SILENT;
    }
    if (s.trim() === '') return undefined;
    const n = Number(s);
    if (!Number.isInteger(n)) return undefined;
    return Math.max(LogLevel.DEBUG, Math.min(LogLevel.SILENT, n));
}

/**
 * Resolve the fallback level of registry loggers:
 * 1) explicit `level`
 * 2) `HMCCLIENT_DEBUG` truthy → DEBUG
 * 3) `HMCCLIENT_LOG_LEVEL`
 * 4) `NODE_ENV=production` → ERROR, else WARN
 */
export function resolveLevel(explicit?: LogLevel, env: Env = defaultEnv()): LogLevel {
    if (explicit !== undefined) return explicit;

    const dm = env[DEBUG_ENV_VAR]?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return LogLevel.DEBUG;

    const level = parseLogLevel(env[LEVEL_ENV_VAR]);
    if (level !== undefined) return level;

    return env.NODE_ENV?.trim().toLowerCase() === 'production' ? LogLevel.ERROR : LogLevel.WARN;
}

export function defaultEnv(): Env {
    return typeof process !== 'undefined' ? process.env : {};
}
