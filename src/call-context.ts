import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Tracks which library namespaces have an API call in progress. The state
 * follows synchronous nesting and the async continuations of a call, so a
 * call counts as internal whenever it runs on behalf of another API call of
 * the same namespace.
 */
export class CallContext {
    private readonly storage = new AsyncLocalStorage<ReadonlySet<string>>();

    isActive(namespace: string): boolean {
        return this.storage.getStore()?.has(namespace) ?? false;
    }

    /**
     * Run `fn` with `namespace` marked active. Re-entering an active namespace
     * keeps the current store.
     */
    run<T>(namespace: string, fn: () => T): T {
        const active = this.storage.getStore();
        if (active?.has(namespace)) return fn();
        const next = new Set(active);
        next.add(namespace);
        return this.storage.run(next, fn);
    }

    /**
     * Run `fn` with `namespace` marked inactive, for consumer code the
     * library calls back into (callbacks, listeners).
     */
    exit<T>(namespace: string, fn: () => T): T {
        const active = this.storage.getStore();
        if (!active?.has(namespace)) return fn();
        const next = new Set(active);
        next.delete(namespace);
        return this.storage.run(next, fn);
    }

    activeNamespaces(): string[] {
        const store = this.storage.getStore();
        return store ? Array.from(store) : [];
    }
}

/** Shared by every decorator set that does not bring its own context */
export const defaultCallContext = new CallContext();
