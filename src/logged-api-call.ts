import { CallContext, defaultCallContext } from './call-context';
import {
  API_LOGGER_NAME,
  ARGS_REPR_LIMIT,
  LIBRARY_NAMESPACE,
  RESULT_REPR_LIMIT,
} from './constants';
import { LoggingConfigurationError } from './errors';
import { capRepr, repr } from './format';
import type { Logger } from './logger';
import { isPlainObject, makeMask } from './redact';
import { defaultRegistry, type LoggerRegistry } from './registry';
import { LogLevel, type MaskFn } from './types';

export interface ApiCallLoggingOptions {
  /** Namespace whose calls count as internal (default: the library namespace) */
  namespace?: string;
  /** Logger receiving the call records (default: `hmcclient.api`) */
  loggerName?: string;
  registry?: LoggerRegistry;
  context?: CallContext;
  argsLimit?: number;
  resultLimit?: number;
  /** Applied to arguments and results before rendering (default: credential mask) */
  mask?: MaskFn;
}

type Callable = (this: unknown, ...args: unknown[]) => unknown;

/**
 * `loggedApiCall` works on a plain function and as a method decorator
 * (`experimentalDecorators`).
 */
export interface LoggedApiCall {
  <A extends unknown[], R, T = unknown>(fn: (this: T, ...args: A) => R): (this: T, ...args: A) => R;
  (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor;
  (target: object, propertyKey: string | symbol): void;
}

const UNREPRESENTABLE = '[Unrepresentable]';

const MISUSE_MESSAGE =
  'The @loggedApiCall decorator must be used on a function or method (and not on a class, property or accessor)';

/**
 * Logs calls entering the library from outside: one debug record on entry
 * and one on normal return, through a single shared logger.
 */
export class ApiCallLogging {
  readonly namespace: string;
  readonly logger: Logger;
  private readonly context: CallContext;
  private readonly argsLimit: number;
  private readonly resultLimit: number;
  private readonly mask: MaskFn;

  constructor(options: ApiCallLoggingOptions = {}) {
    this.namespace = options.namespace ?? LIBRARY_NAMESPACE;
    this.logger = (options.registry ?? defaultRegistry).getLogger(options.loggerName ?? API_LOGGER_NAME);
    this.context = options.context ?? defaultCallContext;
    this.argsLimit = options.argsLimit ?? ARGS_REPR_LIMIT;
    this.resultLimit = options.resultLimit ?? RESULT_REPR_LIMIT;
    this.mask = options.mask ?? makeMask();
  }

  /**
   * Wrap `fn`; `displayName` is used verbatim in every record of the wrapper
   */
  wrap<A extends unknown[], R, T>(fn: (this: T, ...args: A) => R, displayName: string): (this: T, ...args: A) => R {
    const calls = this;
    const wrapped = function (this: T, ...args: A): R {
      return calls.invoke(fn, displayName, this, args);
    };
    Object.defineProperty(wrapped, 'name', { value: fn.name, configurable: true });
    Object.defineProperty(wrapped, 'length', { value: fn.length, configurable: true });
    return wrapped;
  }

  /**
   * Run `fn` as library code: API calls made inside it are not logged
   */
  runInternal<T>(fn: () => T): T {
    return this.context.run(this.namespace, fn);
  }

  /**
   * Run consumer code called back by the library: API calls made inside it
   * are logged again
   */
  runExternal<T>(fn: () => T): T {
    return this.context.exit(this.namespace, fn);
  }

  /** True when no call of this namespace is in progress */
  isExternalCall(): boolean {
    return !this.context.isActive(this.namespace);
  }

  private invoke<A extends unknown[], R, T>(
    fn: (this: T, ...args: A) => R,
    displayName: string,
    thisArg: T,
    args: A,
  ): R {
    const logIt = this.isExternalCall();
    if (logIt) this.logEntry(displayName, args);

    const result = this.context.run(this.namespace, () => fn.apply(thisArg, args));

    if (logIt) {
      if (result instanceof Promise) {
        // The rejection reaches the caller through `result`; only fulfilment is logged.
        void result.then(
          (value: unknown) => this.logExit(displayName, value),
          () => undefined,
        );
      } else {
        this.logExit(displayName, result);
      }
    }
    return result;
  }

  private logEntry(displayName: string, args: readonly unknown[]): void {
    if (!this.logger.isEnabledFor(LogLevel.DEBUG)) return;
    const [positional, named] = splitArgs(args);
    this.logger.debug(
      `==> ${displayName}, args: ${this.render(positional, this.argsLimit)}, kwargs: ${this.render(named, this.argsLimit)}`,
    );
  }

  private logExit(displayName: string, result: unknown): void {
    if (!this.logger.isEnabledFor(LogLevel.DEBUG)) return;
    this.logger.debug(`<== ${displayName}, result: ${this.render(result, this.resultLimit)}`);
  }

  /** Never throws: a value the mask or `repr` cannot handle renders as a placeholder */
  private render(value: unknown, limit: number): string {
    try {
      return capRepr(repr(this.mask(value)), limit);
    } catch {
      return UNREPRESENTABLE;
    }
  }
}

/**
 * Build a `loggedApiCall` bound to `calls`
 */
export function createLoggedApiCall(calls: ApiCallLogging): LoggedApiCall {
  function loggedApiCall<A extends unknown[], R, T = unknown>(fn: (this: T, ...args: A) => R): (this: T, ...args: A) => R;
  function loggedApiCall(target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor;
  function loggedApiCall(target: object, propertyKey: string | symbol): void;
  function loggedApiCall(
    target: unknown,
    propertyKey?: string | symbol,
    descriptor?: PropertyDescriptor,
  ): unknown {
    if (propertyKey === undefined) {
      if (!isPlainFunction(target)) throw new LoggingConfigurationError(MISUSE_MESSAGE);
      return calls.wrap(target, `${target.name || '<anonymous>'}()`);
    }

    if (!descriptor || descriptor.get || descriptor.set) throw new LoggingConfigurationError(MISUSE_MESSAGE);
    const method: unknown = descriptor.value;
    if (!isPlainFunction(method)) throw new LoggingConfigurationError(MISUSE_MESSAGE);

    return {
      ...descriptor,
      value: calls.wrap(method, `${ownerName(target)}.${String(propertyKey)}()`),
    };
  }
  return loggedApiCall;
}

/**
 * Create a decorator set for `options`; the module-level exports use the defaults
 */
export function createApiCallLogging(options: ApiCallLoggingOptions = {}): {
  calls: ApiCallLogging;
  loggedApiCall: LoggedApiCall;
  runInternal: <T>(fn: () => T) => T;
  runExternal: <T>(fn: () => T) => T;
} {
  const calls = new ApiCallLogging(options);
  return {
    calls,
    loggedApiCall: createLoggedApiCall(calls),
    runInternal: <T>(fn: () => T): T => calls.runInternal(fn),
    runExternal: <T>(fn: () => T): T => calls.runExternal(fn),
  };
}

const library = createApiCallLogging();

export const apiCalls = library.calls;
export const loggedApiCall = library.loggedApiCall;
export const runInternal = library.runInternal;
export const runExternal = library.runExternal;

/* ------------------------------- Internals --------------------------------- */

/**
 * The trailing plain-object argument (an options bag) is reported as kwargs.
 * An argument whose prototype cannot be read (a revoked proxy) stays positional.
 */
function splitArgs(args: readonly unknown[]): [unknown[], Record<string, unknown>] {
  const last = args[args.length - 1];
  return hasOptionsBag(last) ? [args.slice(0, -1), last] : [[...args], {}];
}

function hasOptionsBag(value: unknown): value is Record<string, unknown> {
  try {
    return isPlainObject(value);
  } catch {
    return false;
  }
}

function isPlainFunction(value: unknown): value is Callable {
  if (typeof value !== 'function') return false;
  return !/^class[\s{]/.test(Function.prototype.toString.call(value));
}

function ownerName(target: unknown): string {
  if (typeof target === 'function') return target.name || '<anonymous>';
  if (target !== null && typeof target === 'object') {
    const ctor: unknown = Reflect.get(target, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
  }
  return '<unknown>';
}
