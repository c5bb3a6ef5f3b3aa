import { basename, join, resolve } from 'path';
import { readFileSync, statSync } from 'fs-extra';
import flatMap from 'lodash/flatMap';
import makeDebug from 'debug';
import { ancestorDirectories, explicitRelative, type PackageSpecifier } from '@nodule/shared-internals';
import type { Loader } from './loader';
import type Module from './module';
import type Request from './request';
import type { Resolution, Resolver } from './resolver';
import { warn } from './messages';

const debug = makeDebug('nodule:resolver');

export interface StdResolverOptions {
  modulesDirectory?: string;
  packageMain?: string;
  linkFile?: string;
}

interface Hit {
  filename: string;
  loader: Loader;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

// Filesystem lookup. Relative and absolute requests have exactly one place to
// look. Bare requests walk the modules directories above the origin, then the
// request's extra search path, then our own search path.
export default class StdResolver implements Resolver {
  readonly debugType = 'std';
  readonly modulesDirectory: string;
  readonly packageMain: string;
  readonly linkFile: string;

  constructor(readonly searchPaths: string[], readonly loaders: Loader[], options: StdResolverOptions = {}) {
    this.modulesDirectory = options.modulesDirectory ?? 'node_modules';
    this.packageMain = options.packageMain ?? 'index';
    this.linkFile = options.linkFile ?? '.nodule-link';
  }

  resolveModule(request: Request): Resolution {
    let searchPaths: string[] = [];

    if (request.isRelative || request.isAbsolute) {
      let base = resolve(request.directory, request.string);
      searchPaths.push(base);
      let hit = this.findInBase(request, base);
      if (hit) {
        return { type: 'found', module: this.moduleFor(request, hit) };
      }
      return { type: 'not_found', searchPaths };
    }

    let specifier = request.package;
    if (!specifier) {
      debug(`not a resolvable request: %s`, request.string);
      return { type: 'not_found', searchPaths };
    }

    for (let dir of this.lookupDirectories(request)) {
      let base = this.followLink(dir, specifier) ?? join(dir, request.string);
      searchPaths.push(base);
      let hit = this.findInBase(request, base);
      if (hit) {
        return { type: 'found', module: this.moduleFor(request, hit) };
      }
    }
    return { type: 'not_found', searchPaths };
  }

  lookupDirectories(request: Request): string[] {
    let modulesDirs = ancestorDirectories(request.directory)
      .filter(dir => basename(dir) !== this.modulesDirectory)
      .map(dir => join(dir, this.modulesDirectory));
    return [...modulesDirs, ...request.additionalSearchPath, ...this.searchPaths];
  }

  // A package directory may hold a link file naming where the package really
  // lives, relative to the package directory.
  private followLink(dir: string, specifier: PackageSpecifier): string | undefined {
    let packageDir = join(dir, specifier.name);
    let linkPath = join(packageDir, this.linkFile);
    if (!isFile(linkPath)) {
      return;
    }
    let target = resolve(packageDir, readFileSync(linkPath, 'utf8').trim());
    debug(`following link %s to %s`, linkPath, target);
    return join(target, specifier.subpath);
  }

  private findFile(path: string): Hit | undefined {
    if (isFile(path)) {
      let loader = this.loaders.find(l => l.canLoad(path));
      if (loader) {
        return { filename: path, loader };
      }
    }
    let suggestions = flatMap(this.loaders, loader => loader.suggestFiles(path).map(filename => ({ filename, loader })));
    return suggestions.find(candidate => isFile(candidate.filename));
  }

  private findInBase(request: Request, base: string): Hit | undefined {
    let hit = this.findFile(base);
    if (hit || !isDirectory(base)) {
      return hit;
    }

    let packageCache = request.context.packageCache;
    if (packageCache.hasManifest(base)) {
      let main = packageCache.get(base).main;
      if (main) {
        hit = this.findFile(resolve(base, main));
        if (hit) {
          return hit;
        }
        warn(`package %s names a "main" of %s, which does not exist`, base, main);
      }
    }
    return this.findFile(join(base, this.packageMain));
  }

  private moduleFor(request: Request, hit: Hit): Module {
    let { context } = request;
    let filename = context.packageCache.realpath(hit.filename);
    let existing = context.modules.get(filename);
    if (existing) {
      debug(`cache hit: %s from %s`, request.string, request.directory);
      return existing;
    }
    debug(
      `resolved %s from %s to %s with %s`,
      request.string,
      request.directory,
      explicitRelative(request.directory, filename),
      hit.loader.debugType
    );
    return hit.loader.createModule(context, filename, context.packageCache.ownerOfFile(filename));
  }
}
