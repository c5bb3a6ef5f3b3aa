import { isAbsolute } from 'path';
import { isRelativeSpecifier, parsePackageSpecifier, type PackageSpecifier } from '@nodule/shared-internals';
import type Context from './context';

// What to resolve and from where. Requests are never edited; a retry builds a
// new one.
export default class Request {
  readonly additionalSearchPath: readonly string[];

  constructor(
    readonly context: Context,
    readonly directory: string,
    readonly string: string,
    additionalSearchPath: readonly string[] = []
  ) {
    if (!isAbsolute(directory)) {
      throw new Error(`request origin must be an absolute directory, got ${directory}`);
    }
    this.additionalSearchPath = Object.freeze([...additionalSearchPath]);
    Object.freeze(this);
  }

  get isRelative(): boolean {
    return isRelativeSpecifier(this.string);
  }

  get isAbsolute(): boolean {
    return isAbsolute(this.string);
  }

  // undefined for relative and absolute requests
  get package(): PackageSpecifier | undefined {
    return parsePackageSpecifier(this.string);
  }

  toString(): string {
    return `${this.string} (from ${this.directory})`;
  }
}
