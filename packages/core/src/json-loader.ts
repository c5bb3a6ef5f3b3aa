import { readJSONSync } from 'fs-extra';
import type { Package } from '@nodule/shared-internals';
import type Context from './context';
import Module from './module';
import type { ExecutionContext, Loader } from './loader';

export default class JsonLoader implements Loader {
  readonly debugType = 'json';

  canLoad(filename: string): boolean {
    return filename.toLowerCase().endsWith('.json');
  }

  suggestFiles(base: string): string[] {
    return [`${base}.json`];
  }

  createModule(context: Context, filename: string, pkg: Package | undefined): Module {
    return new Module(context, filename, this, pkg);
  }

  load({ module, setExports }: ExecutionContext): void {
    let data: unknown = readJSONSync(module.filename);
    setExports(data);
  }
}
