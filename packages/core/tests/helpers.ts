import { join, resolve } from 'path';
import { realpathSync } from 'fs';
import tmp from 'tmp';
import fixturify from 'fixturify';
import Context from '../src/context';
import Module from '../src/module';
import type Request from '../src/request';
import type { ExecutionContext, Loader } from '../src/loader';
import type { Resolution, Resolver } from '../src/resolver';
import type Options from '../src/options';

tmp.setGracefulCleanup();

export type Body = (execution: ExecutionContext) => void;

// Runs plain functions as module bodies and counts how often each one ran.
export class MemoryLoader implements Loader {
  readonly debugType = 'memory';
  readonly runs: Map<string, number> = new Map();

  constructor(readonly bodies: Map<string, Body>) {}

  canLoad(filename: string): boolean {
    return this.bodies.has(filename);
  }

  suggestFiles(base: string): string[] {
    return [`${base}.js`];
  }

  createModule(context: Context, filename: string): Module {
    return new Module(context, filename, this);
  }

  load(execution: ExecutionContext): void {
    let { filename } = execution.module;
    this.runs.set(filename, this.runCount(filename) + 1);
    let body = this.bodies.get(filename);
    if (!body) {
      throw new Error(`no body for ${filename}`);
    }
    body(execution);
  }

  runCount(filename: string): number {
    return this.runs.get(filename) ?? 0;
  }
}

// Resolves against the MemoryLoader's bodies instead of the filesystem. Bare
// requests are looked up under each of `roots`, in order.
export class MemoryResolver implements Resolver {
  calls = 0;

  constructor(readonly debugType: string, private loader: MemoryLoader, private roots: string[]) {}

  resolveModule(request: Request): Resolution {
    this.calls++;
    let bases =
      request.isRelative || request.isAbsolute
        ? [resolve(request.directory, request.string)]
        : this.roots.map(root => join(root, request.string));
    for (let base of bases) {
      for (let candidate of [base, ...this.loader.suggestFiles(base)]) {
        if (this.loader.canLoad(candidate)) {
          let module = request.context.modules.get(candidate) ?? this.loader.createModule(request.context, candidate);
          return { type: 'found', module };
        }
      }
    }
    return { type: 'not_found', searchPaths: bases };
  }
}

export function memoryContext(bodies: Record<string, Body>, options: Options = {}) {
  let loader = new MemoryLoader(new Map(Object.entries(bodies)));
  let context = new Context({ mainDir: '/virtual', debugger: { type: 'default' }, ...options, bare: true });
  let resolver = new MemoryResolver('memory', loader, ['/lib']);
  context.resolvers.push(resolver);
  return { context, loader, resolver };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected fn to throw');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

export function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

export interface Fixture {
  [name: string]: string | Fixture;
}

export function project(files: Fixture): string {
  let { name } = tmp.dirSync({ unsafeCleanup: true });
  let root = realpathSync(name);
  fixturify.writeSync(root, files);
  return root;
}
