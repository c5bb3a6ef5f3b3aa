export { default as Context, defaultBreakpoint } from './context';
export { default as Module, NOT_SET } from './module';
export type { LoadState } from './module';
export { default as Request } from './request';
export { default as Require } from './require';
export type { RequireFunction, RequireOptions, TryManyOptions } from './require';
export type { Resolver, Resolution } from './resolver';
export { default as StdResolver } from './std-resolver';
export type { StdResolverOptions } from './std-resolver';
export { defineBindings } from './loader';
export type { Loader, ExecutionContext } from './loader';
export { default as ScriptLoader } from './script-loader';
export type { ScriptLoaderOptions } from './script-loader';
export { default as JsonLoader } from './json-loader';
export { optionsWithDefaults, debuggerConfigFromEnv, describeDebugger } from './options';
export type { default as Options, CoreOptionsType, DebuggerConfig } from './options';
export {
  ResolveError,
  LoadError,
  ConsistencyError,
  UsageError,
  isResolveError,
  isLoadError,
  isConsistencyError,
  isUsageError,
  describeError,
} from './errors';
export { warn, expectWarning, throwOnWarnings } from './messages';

// re-exported so that consumers don't need a separate dependency for Package
// and PackageCache
export * from '@nodule/shared-internals';
