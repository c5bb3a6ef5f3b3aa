import { readFileSync } from 'fs-extra';
import { createContext, Script } from 'vm';
import stripBom from 'strip-bom';
import makeDebug from 'debug';
import { extensionsPattern, type Package } from '@nodule/shared-internals';
import type Context from './context';
import Module from './module';
import { defineBindings, type ExecutionContext, type Loader } from './loader';

const debug = makeDebug('nodule:loader');

export interface ScriptLoaderOptions {
  extensions?: string[];
  // runs on the source text before it is compiled
  transform?: (source: string, filename: string) => string;
}

// Runs a script with the module's namespace as its global object, so top-level
// `var` and function declarations land in the namespace.
export default class ScriptLoader implements Loader {
  readonly debugType = 'script';
  readonly extensions: string[];
  private pattern: RegExp;
  private transform: ((source: string, filename: string) => string) | undefined;

  constructor(options: ScriptLoaderOptions = {}) {
    this.extensions = options.extensions ?? ['.js', '.cjs'];
    this.pattern = extensionsPattern(this.extensions);
    this.transform = options.transform;
  }

  canLoad(filename: string): boolean {
    return this.pattern.test(filename);
  }

  suggestFiles(base: string): string[] {
    return this.extensions.map(ext => `${base}${ext}`);
  }

  createModule(context: Context, filename: string, pkg: Package | undefined): Module {
    return new Module(context, filename, this, pkg);
  }

  load({ module, namespace }: ExecutionContext): void {
    let source = stripBom(readFileSync(module.filename, 'utf8')).replace(/^#!.*/, '');
    if (this.transform) {
      source = this.transform(source, module.filename);
    }
    defineBindings(namespace, { console });
    debug(`executing %s`, module.filename);
    let script = new Script(source, { filename: module.filename });
    script.runInContext(createContext(namespace));
  }
}
