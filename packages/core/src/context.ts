import assertNever from 'assert-never';
import makeDebug from 'debug';
import { explicitRelative, PackageCache } from '@nodule/shared-internals';
import { ConsistencyError, describeError, isConsistencyError, LoadError, ResolveError, UsageError } from './errors';
import JsonLoader from './json-loader';
import Module from './module';
import { describeDebugger, optionsWithDefaults, type DebuggerConfig } from './options';
import Request from './request';
import Require, { type RequireOptions } from './require';
import type { Resolver } from './resolver';
import ScriptLoader from './script-loader';
import StdResolver from './std-resolver';
import type Options from './options';

const debug = makeDebug('nodule:context');

export function defaultBreakpoint(err?: unknown): void {
  if (err !== undefined) {
    debug(`breakpoint at %s`, describeError(err));
  }
  // eslint-disable-next-line no-debugger
  debugger;
}

// Owns the resolver chain, the module cache and the stack of modules that are
// in the middle of loading. Everything runs synchronously on the caller's
// stack; a module body that requires something re-enters resolve() and
// loadModule() before its own load has finished.
export default class Context {
  readonly mainDir: string;
  readonly resolvers: Resolver[] = [];
  readonly modules: Map<string, Module> = new Map();
  readonly moduleStack: Module[] = [];
  readonly packageCache: PackageCache;
  readonly debuggerConfig: DebuggerConfig;
  readonly mainRequire: Require;
  mainModule: Module | undefined;

  // replace to plug in a different debugger for `require.breakpoint()`
  breakpoint: (err?: unknown) => void = defaultBreakpoint;

  constructor(options?: Options) {
    let opts = optionsWithDefaults(options);
    this.mainDir = opts.mainDir;
    this.packageCache = new PackageCache(this.mainDir, opts.modulesDirectory);
    this.debuggerConfig = opts.debugger;
    this.mainRequire = new Require(this, this.mainDir);
    if (!opts.bare) {
      let loaders = [
        new ScriptLoader({ extensions: opts.scriptExtensions, transform: opts.transformScript }),
        new JsonLoader(),
      ];
      this.resolvers.push(
        new StdResolver(opts.searchPaths, loaders, {
          modulesDirectory: opts.modulesDirectory,
          packageMain: opts.packageMain,
          linkFile: opts.linkFile,
        })
      );
    }
    debug(`context in %s, breakpoints use %s`, this.mainDir, describeDebugger(this.debuggerConfig));
  }

  // Walks the resolvers in order. The first hit wins; a miss from every
  // resolver throws a ResolveError listing everywhere they looked.
  resolve(request: Request | string, directory?: string, additionalSearchPath: readonly string[] = []): Module {
    if (typeof request === 'string') {
      request = new Request(this, directory ?? process.cwd(), request, additionalSearchPath);
    }

    let searchPaths: string[] = [];
    for (let resolver of this.resolvers) {
      let resolution = resolver.resolveModule(request);
      switch (resolution.type) {
        case 'not_found':
          searchPaths.push(...resolution.searchPaths);
          continue;
        case 'found':
          return this.register(resolver, resolution.module);
        default:
          throw assertNever(resolution);
      }
    }

    debug(`not found: %s from %s`, request.string, request.directory);
    throw new ResolveError(request, searchPaths);
  }

  private register(resolver: Resolver, module: unknown): Module {
    if (!(module instanceof Module)) {
      throw new ConsistencyError(`${resolver.debugType} resolver returned a non-Module object`);
    }
    let existing = this.modules.get(module.filename);
    if (existing && existing !== module) {
      throw new ConsistencyError(
        `${resolver.debugType} resolver returned a new Module object for ${module.filename}, which is already cached`
      );
    }
    this.modules.set(module.filename, module);

    let parent = this.currentModule;
    if (parent && parent !== module && module.state === 'unloaded' && !module.parent) {
      module.parent = parent;
      parent.children.add(module);
    }
    return module;
  }

  // The one way modules should get loaded. A module that failed before throws
  // its stored error again without running; one that is already loading (a
  // cycle) is left alone so the caller sees its partial namespace.
  loadModule(module: Module, doInit = true): void {
    if (module.exception) {
      throw module.exception;
    }
    switch (module.state) {
      case 'loaded':
        return;
      case 'loading':
        debug(`cycle: %s is still loading`, module.filename);
        return;
      case 'unloaded':
      case 'failed':
        break;
      default:
        throw assertNever(module.state);
    }
    if (this.modules.get(module.filename) !== module) {
      throw new ConsistencyError(`${module} can not be loaded when it is not in Context.modules`);
    }

    if (doInit) {
      module.init();
    }
    module.state = 'loading';
    this.moduleStack.push(module);
    debug(`loading %s (depth %d)`, explicitRelative(this.mainDir, module.filename), this.moduleStack.length);
    try {
      module.load();
      module.state = 'loaded';
    } catch (err) {
      // ConsistencyErrors are stored unwrapped
      let error = isConsistencyError(err) ? err : new LoadError(module, err);
      module.exception = error;
      module.state = 'failed';
      this.modules.delete(module.filename);
      this.packageCache.forgetManifests();
      debug(`failed %s: %s`, module.filename, error.message);
      throw error;
    } finally {
      if (this.moduleStack.pop() !== module) {
        // eslint-disable-next-line no-unsafe-finally
        throw new ConsistencyError('Context.moduleStack corrupted');
      }
    }
  }

  // resolve + load + unwrap, from the directory of whatever module is loading
  // right now (or mainDir at the top level).
  require(request: string): unknown;
  require(request: string, options: { exports: false }): Module;
  require(request: string, options?: RequireOptions): unknown;
  require(request: string, options?: RequireOptions): unknown {
    let facade = this.currentModule?.require ?? this.mainRequire;
    return facade.call(request, options);
  }

  get currentModule(): Module | undefined {
    return this.moduleStack[this.moduleStack.length - 1];
  }

  // Shadows mainModule for the duration of `fn`, however it exits.
  pushMain<T>(module: Module, fn: () => T): T {
    if (!(module instanceof Module)) {
      throw new UsageError('pushMain() expects a Module');
    }
    let prevModule = this.mainModule;
    this.mainModule = module;
    try {
      return fn();
    } finally {
      this.mainModule = prevModule;
    }
  }

  // Loads `request` (resolved from mainDir) as the main module and returns what
  // it exports.
  runMain(request: string): unknown {
    let module = this.mainRequire.resolve(request);
    return this.pushMain(module, () => {
      this.loadModule(module);
      return module.value;
    });
  }
}
