// Redaction of credentials in logged API arguments, results and HMC payloads.

/* ---------------------------------- Types ---------------------------------- */

export type RedactOptions = {
    /** Replacement for values of matching keys; default '***' */
    mask?: string;
    /** Case-insensitive key matching. Default: true (HTTP header names vary in case) */
    ciKeys?: boolean;
    /** Match keys that merely contain a sensitive key (e.g. 'ssh-password'). Default: false */
    partialMatch?: boolean;
    /** Summarize typed arrays and buffers instead of copying them. Default: true */
    summarizeBinary?: boolean;
    /** Value used when reading a property throws; default '[GetterError]' */
    getterErrorValue?: string;
    /** Max recursion depth; 0 = only root. Default: 8 */
    maxDepth?: number;
    /** Max visited nodes. Default: 50_000 */
    maxNodes?: number;
};

/* --------------------------- Default mask key set --------------------------- */

/** Keys whose values never reach a log record: HMC logon and session credentials. */
export const DEFAULT_MASK_KEYS: readonly string[] = Object.freeze([
    'password', 'new-password', 'old-password',
    'api-session', 'x-api-session', 'session-credential',
    'authorization', 'token', 'secret',
]);

const DEFAULT_MASK_SET = new Set<string>(DEFAULT_MASK_KEYS);

/** Add keys to the default mask set used by `makeMask()`. */
export function extendDefaultMaskKeys(keys: string[]): void {
    for (const k of keys) DEFAULT_MASK_SET.add(k);
}

/* ------------------------------- Redact core ------------------------------- */

type Walk = {
    mask: string;
    maxDepth: number;
    maxNodes: number;
    summarizeBinary: boolean;
    getterError: string;
    matchKey: (k: string) => boolean;
    seen: WeakSet<object>;
    nodes: number;
};

/**
 * Deep copy of `value` with the values of sensitive keys replaced.
 * Primitives are returned as they are.
 */
export function redact(
    value: unknown,
    maskKeys: Iterable<string>,
    maskOrOpts: string | RedactOptions = '***'
): unknown {
    if (value === null || typeof value !== 'object') return value;
    const opts: RedactOptions = typeof maskOrOpts === 'string' ? { mask: maskOrOpts } : maskOrOpts;
    return walk(value, {
        mask: opts.mask ?? '***',
        maxDepth: opts.maxDepth ?? 8,
        maxNodes: opts.maxNodes ?? 50_000,
        summarizeBinary: opts.summarizeBinary ?? true,
        getterError: opts.getterErrorValue ?? '[GetterError]',
        matchKey: makeKeyMatcher(maskKeys, opts.ciKeys ?? true, opts.partialMatch ?? false),
        seen: new WeakSet<object>(),
        nodes: 0,
    }, 0);
}

/** Build a mask function; without keys the default mask set applies. An empty list masks nothing. */
export function makeMask(maskKeys?: Iterable<string>, opts?: RedactOptions): (value: unknown) => unknown {
    if (Array.isArray(maskKeys) && maskKeys.length === 0) return (x: unknown) => x;
    const keys = maskKeys ?? DEFAULT_MASK_SET;
    return (x: unknown) => redact(x, keys, opts);
}

/* ------------------------------- Internals --------------------------------- */

function walk(value: unknown, w: Walk, depth: number): unknown {
    if (value === null || typeof value !== 'object') return value;

    if (depth >= w.maxDepth) return '[DepthLimit]';
    if (w.nodes++ > w.maxNodes) return '[TooLarge]';
    if (w.seen.has(value)) return '[Circular]';
    w.seen.add(value);

    if (w.summarizeBinary) {
        if (ArrayBuffer.isView(value)) return `[Binary ${value.byteLength} bytes]`;
        if (value instanceof ArrayBuffer) return `[Binary ${value.byteLength} bytes]`;
    }

    if (Array.isArray(value)) {
        return value.map((item: unknown) => walk(item, w, depth + 1));
    }
    if (value instanceof Map) {
        const out: [unknown, unknown][] = [];
        for (const [k, v] of value) {
            const hidden = typeof k === 'string' && w.matchKey(k);
            out.push([k, hidden ? w.mask : walk(v, w, depth + 1)]);
        }
        return out;
    }
    if (value instanceof Set) {
        return Array.from(value, (v: unknown) => walk(v, w, depth + 1));
    }
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    if (value instanceof Date) return new Date(value.getTime());

    // Class instances (resources, sessions) are copied as bags of own enumerable keys.
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value)) {
        try {
            const v: unknown = Reflect.get(value, k);
            out[k] = w.matchKey(k) ? w.mask : walk(v, w, depth + 1);
        } catch {
            out[k] = w.getterError;
        }
    }
    return out;
}

function makeKeyMatcher(keys: Iterable<string>, ci: boolean, partial: boolean): (k: string) => boolean {
    const set = new Set<string>();
    for (const k of keys) set.add(ci ? k.toLowerCase() : k);
    return (k: string) => {
        const kk = ci ? k.toLowerCase() : k;
        if (set.has(kk)) return true;
        if (partial) for (const sk of set) if (kk.includes(sk)) return true;
        return false;
    };
}

/** Plain object: no prototype or `Object.prototype` directly */
export function isPlainObject(v: unknown): v is Record<string, unknown> {
    if (v === null || typeof v !== 'object') return false;
    const proto: unknown = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
}
