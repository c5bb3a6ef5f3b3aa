import type { Package } from '@nodule/shared-internals';
import type Context from './context';
import type Module from './module';
import type Require from './require';

// Everything a loader may touch while running a module body. Loaders get this
// handed to them; they never reach into ambient state.
export interface ExecutionContext {
  readonly module: Module;
  readonly namespace: Record<string, unknown>;
  readonly require: Require;
  setExports(value: unknown): void;
}

export interface Loader {
  readonly debugType: string;

  // whether a file that already exists on disk is ours to load
  canLoad(filename: string): boolean;

  // filenames worth trying for an extensionless request, in priority order
  suggestFiles(base: string): string[];

  createModule(context: Context, filename: string, pkg: Package | undefined): Module;

  load(execution: ExecutionContext): void;
}

// Bindings are non-enumerable so that they stay out of a module's exported
// names when its namespace doubles as its exports.
export function defineBindings(namespace: Record<string, unknown>, bindings: Record<string, unknown>): void {
  for (let [name, value] of Object.entries(bindings)) {
    Object.defineProperty(namespace, name, {
      value,
      writable: true,
      configurable: true,
      enumerable: false,
    });
  }
}
