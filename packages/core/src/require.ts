import { resolve } from 'path';
import assertNever from 'assert-never';
import type Context from './context';
import type Module from './module';
import { isLoadError, isResolveError, UsageError, type ResolveError } from './errors';

export interface RequireOptions {
  // false hands back the Module itself instead of its exports
  exports?: boolean;
}

export interface TryManyOptions extends RequireOptions {
  // false stops after resolution and hands back the (unloaded) Module
  load?: boolean;
}

// The callable that module bodies see as `require`.
export interface RequireFunction {
  (request: string, options?: RequireOptions): unknown;
  readonly facade: Require;
  readonly path: string[];
  readonly cache: Map<string, Module>;
  resolve(request: string): Module;
  tryMany(requests: readonly string[], options?: TryManyOptions): unknown;
  star(request: string, symbols?: string | readonly string[]): Record<string, unknown>;
  breakpoint(err?: unknown): void;
  forDirectory(directory: string): RequireFunction;
  main(): Module | undefined;
  current(): Module | undefined;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function parseSymbols(symbols: string | readonly string[]): readonly string[] {
  if (typeof symbols !== 'string') {
    return symbols;
  }
  let separator = symbols.includes(',') ? ',' : /\s+/;
  return symbols
    .split(separator)
    .map(name => name.trim())
    .filter(Boolean);
}

function declaredExports(request: string, value: object): readonly string[] | undefined {
  let list: unknown = Reflect.get(value, '_exports');
  if (list === undefined) {
    return;
  }
  if (!Array.isArray(list) || !list.every((name): name is string => typeof name === 'string')) {
    throw new UsageError(`"${request}" has an _exports that is not a list of names`);
  }
  return list;
}

// A view of the context from one directory. Remembers what each request
// string resolved to, so repeated requests skip the resolver chain; the
// context's identity cache still decides which Module object that is.
export default class Require {
  // extra search locations, passed along with every request
  readonly path: string[] = [];
  readonly cache: Map<string, Module> = new Map();
  private fn: RequireFunction | undefined;

  constructor(readonly context: Context, readonly directory: string) {}

  call(request: string): unknown;
  call(request: string, options: { exports: false }): Module;
  call(request: string, options?: RequireOptions): unknown;
  call(request: string, options: RequireOptions = {}): unknown {
    let module = this.resolve(request);
    if (!module.loaded) {
      this.context.loadModule(module);
    }
    return options.exports === false ? module : module.value;
  }

  resolve(request: string): Module {
    let module = this.cache.get(request);
    // a module whose body failed was evicted from the context; resolving again
    // gives the request a fresh attempt. A ConsistencyError stays put.
    if (!module || isLoadError(module.exception)) {
      module = this.context.resolve(request, this.directory, this.path);
      this.cache.set(request, module);
    }
    return module;
  }

  // Requires the first of `requests` that can be found. Only "not found" for
  // the request being tried moves on to the next one; anything else
  // propagates. When none can be found the last ResolveError is rethrown.
  tryMany(requests: readonly string[], options: TryManyOptions = {}): unknown {
    if (requests.length === 0) {
      throw new UsageError('tryMany() needs at least one request');
    }
    let lastError: ResolveError | undefined;
    for (let request of requests) {
      try {
        if (options.load === false) {
          return this.resolve(request);
        }
        return this.call(request, options);
      } catch (err) {
        if (!isResolveError(err) || err.request.string !== request) {
          throw err;
        }
        lastError = err;
      }
    }
    throw lastError;
  }

  // The names a caller would pull in with a star import, as a plain object for
  // the caller to merge wherever it wants. Without `symbols` that is the
  // module's own `_exports` list when it has one, otherwise every own
  // enumerable name that doesn't start with an underscore.
  star(request: string, symbols?: string | readonly string[]): Record<string, unknown> {
    let value = this.call(request);
    if (!isObjectLike(value)) {
      throw new UsageError(`cannot star-import "${request}": it does not export an object`);
    }
    let result: Record<string, unknown> = {};
    let names = symbols ?? declaredExports(request, value);
    if (names === undefined) {
      for (let [name, member] of Object.entries(value)) {
        if (!name.startsWith('_')) {
          result[name] = member;
        }
      }
      return result;
    }
    for (let name of parseSymbols(names)) {
      if (!(name in value)) {
        throw new UsageError(`"${request}" has no export named "${name}"`);
      }
      result[name] = Reflect.get(value, name);
    }
    return result;
  }

  breakpoint(err?: unknown): void {
    let config = this.context.debuggerConfig;
    switch (config.type) {
      case 'disabled':
        return;
      case 'default':
        this.context.breakpoint(err);
        return;
      case 'named': {
        // debugger modules are looked up from the main directory, not from
        // whichever module happens to call breakpoint().
        let debuggerModule = this.context.resolve(config.request, this.context.mainDir);
        this.context.loadModule(debuggerModule);
        let value = debuggerModule.value;
        let hook = isObjectLike(value) && 'breakpoint' in value ? value.breakpoint : undefined;
        if (typeof hook !== 'function') {
          throw new UsageError(`debugger module "${config.request}" does not export a breakpoint() function`);
        }
        hook.call(value, err);
        return;
      }
      default:
        throw assertNever(config);
    }
  }

  forDirectory(directory: string): Require {
    return new Require(this.context, resolve(this.directory, directory));
  }

  get main(): Module | undefined {
    return this.context.mainModule;
  }

  get current(): Module | undefined {
    return this.context.currentModule;
  }

  asFunction(): RequireFunction {
    if (!this.fn) {
      this.fn = Object.assign((request: string, options?: RequireOptions) => this.call(request, options), {
        facade: this,
        path: this.path,
        cache: this.cache,
        resolve: (request: string) => this.resolve(request),
        tryMany: (requests: readonly string[], options?: TryManyOptions) => this.tryMany(requests, options),
        star: (request: string, symbols?: string | readonly string[]) => this.star(request, symbols),
        breakpoint: (err?: unknown) => this.breakpoint(err),
        forDirectory: (directory: string) => this.forDirectory(directory).asFunction(),
        main: () => this.main,
        current: () => this.current,
      });
    }
    return this.fn;
  }
}
