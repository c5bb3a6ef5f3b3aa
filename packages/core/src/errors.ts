import type Request from './request';
import type Module from './module';

export function describeError(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

// No resolver strategy could find the request. The search paths are every
// location each strategy tried, in resolver order.
export class ResolveError extends Error {
  isResolveError = true;
  code = 'MODULE_NOT_FOUND';

  constructor(readonly request: Request, readonly searchPaths: readonly string[]) {
    super(
      [
        `cannot find module "${request.string}" from ${request.directory}`,
        ...searchPaths.map(path => `  searched: ${path}`),
      ].join('\n')
    );
    this.name = 'ResolveError';
  }
}

// A module body (or its loader) threw. The same instance is stored on the
// module and thrown again on every later attempt to load it.
export class LoadError extends Error {
  isLoadError = true;

  constructor(readonly module: Module, cause: unknown) {
    super(`failed to load ${module.filename}: ${describeError(cause)}`, { cause });
    this.name = 'LoadError';
  }
}

// A violated internal invariant. Never retried.
export class ConsistencyError extends Error {
  isConsistencyError = true;

  constructor(message: string) {
    super(`bug: ${message}`);
    this.name = 'ConsistencyError';
  }
}

export class UsageError extends Error {
  isUsageError = true;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function hasFlag(err: unknown, flag: string): boolean {
  return typeof err === 'object' && err !== null && flag in err && Reflect.get(err, flag) === true;
}

export function isResolveError(err: unknown): err is ResolveError {
  return hasFlag(err, 'isResolveError');
}

export function isLoadError(err: unknown): err is LoadError {
  return hasFlag(err, 'isLoadError');
}

export function isConsistencyError(err: unknown): err is ConsistencyError {
  return hasFlag(err, 'isConsistencyError');
}

export function isUsageError(err: unknown): err is UsageError {
  return hasFlag(err, 'isUsageError');
}
