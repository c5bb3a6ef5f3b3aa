import Package from './package';
import { existsSync, realpathSync } from 'fs-extra';
import { getOrCreate } from './get-or-create';
import { basename, join, resolve } from 'path';

export default class PackageCache {
  private rootCache: Map<string, Package> = new Map();
  private realpathCache: Map<string, string> = new Map();
  private manifestCache: Map<string, boolean> = new Map();

  constructor(public appRoot: string, private modulesDirectory = 'node_modules') {}

  realpath(path: string): string {
    return getOrCreate(this.realpathCache, path, () => realpathSync(path));
  }

  hasManifest(dir: string): boolean {
    return getOrCreate(this.manifestCache, dir, () => existsSync(join(dir, 'package.json')));
  }

  get(packageRoot: string): Package {
    let root = this.realpath(packageRoot);
    return getOrCreate(this.rootCache, root, () => new Package(root, this, root === this.appRoot));
  }

  ownerOfFile(filename: string): Package | undefined {
    let candidate = filename;

    // first we look through our cached packages for any that are rooted right
    // at or above the file.
    while (true) {
      if (basename(candidate) === this.modulesDirectory) {
        // once we hit a modules directory, we're leaving the
        // package we were in, so any higher caches don't apply to us
        break;
      }

      let cached = this.rootCache.get(candidate);
      if (cached) {
        return cached;
      }
      if (this.hasManifest(candidate)) {
        return this.get(candidate);
      }
      let nextCandidate = resolve(candidate, '..');
      if (nextCandidate === candidate) {
        // got to the top
        break;
      }
      candidate = nextCandidate;
    }
  }

  // Drop cached answers about which directories hold a package.json, so a
  // manifest created since the last lookup is seen.
  forgetManifests(): void {
    this.manifestCache.clear();
  }

  // Forget everything learned from the filesystem. Packages handed out before
  // this call stay valid but are no longer shared with later lookups.
  clear(): void {
    this.rootCache.clear();
    this.realpathCache.clear();
    this.manifestCache.clear();
  }
}
