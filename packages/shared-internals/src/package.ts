import { Memoize } from 'typescript-memoize';
import { readJSONSync } from 'fs-extra';
import { join, basename } from 'path';
import { asPackageInfo, type PackageInfo } from './metadata';
import type PackageCache from './package-cache';

export default class Package {
  constructor(readonly root: string, protected packageCache: PackageCache, readonly isApp: boolean) {}

  // unnamed packages (an app root with a bare `{}` manifest, for instance) go
  // by their directory name.
  get name(): string {
    return this.packageJSON.name ?? basename(this.root);
  }

  get version(): string | undefined {
    return this.packageJSON.version;
  }

  get main(): string | undefined {
    return this.packageJSON.main;
  }

  get manifestPath(): string {
    return join(this.root, 'package.json');
  }

  @Memoize()
  get packageJSON(): PackageInfo {
    let json: unknown = readJSONSync(this.manifestPath);
    return asPackageInfo(json, this.manifestPath);
  }
}
