import { dirname } from 'path';
import type { Package } from '@nodule/shared-internals';
import type Context from './context';
import type { ConsistencyError, LoadError } from './errors';
import { defineBindings, type ExecutionContext, type Loader } from './loader';
import Require from './require';

// Distinct from `undefined`: a body that assigns `module.exports = undefined`
// has set its exports.
export const NOT_SET: unique symbol = Symbol('nodule:exports-not-set');

export type LoadState = 'unloaded' | 'loading' | 'loaded' | 'failed';

export default class Module {
  readonly directory: string;
  readonly require: Require;
  readonly children: Set<Module> = new Set();

  state: LoadState = 'unloaded';
  namespace: Record<string, unknown> = {};
  exports: unknown = NOT_SET;
  exception: LoadError | ConsistencyError | undefined;
  parent: Module | undefined;

  constructor(
    readonly context: Context,
    readonly filename: string,
    readonly loader: Loader,
    readonly pkg: Package | undefined = undefined
  ) {
    this.directory = dirname(filename);
    this.require = new Require(context, this.directory);
  }

  get loaded(): boolean {
    return this.state === 'loaded';
  }

  get hasExports(): boolean {
    return this.exports !== NOT_SET;
  }

  // what `require()` hands back: the explicit exports when the body set them,
  // otherwise the whole namespace.
  get value(): unknown {
    return this.exports === NOT_SET ? this.namespace : this.exports;
  }

  // Runs before every load: a fresh namespace with the execution bindings in
  // place.
  init(): void {
    this.namespace = {};
    this.exports = NOT_SET;
    let owner = this;
    defineBindings(this.namespace, {
      module: {
        id: this.filename,
        filename: this.filename,
        get exports(): unknown {
          return owner.value;
        },
        set exports(value: unknown) {
          owner.exports = value;
        },
      },
      require: this.require.asFunction(),
      __filename: this.filename,
      __dirname: this.directory,
    });
  }

  load(): void {
    this.loader.load(this.executionContext());
  }

  executionContext(): ExecutionContext {
    return {
      module: this,
      namespace: this.namespace,
      require: this.require,
      setExports: (value: unknown) => {
        this.exports = value;
      },
    };
  }

  toString(): string {
    return `<Module ${this.filename} (${this.state})>`;
  }
}
