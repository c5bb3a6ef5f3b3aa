import { relative, isAbsolute, dirname, join, basename, resolve } from 'path';

// by "explicit", I mean that we want "./local/thing" instead of "local/thing"
// because
//     require("./local/thing")
// has a different meaning than
//     require("local/thing")
//
export function explicitRelative(fromDir: string, toFile: string): string {
  let result = join(relative(fromDir, dirname(toFile)), basename(toFile));
  if (!isAbsolute(result) && !result.startsWith('.')) {
    result = './' + result;
  }
  if (isAbsolute(toFile) && result.endsWith(toFile)) {
    // no point in "../../../../../Users/you/project/thing.js" when the
    // absolute path says the same thing.
    return toFile;
  }
  return result.replace(/\\/g, '/');
}

// given a list like ['.js', '.cjs'], return a regular expression for files ending
// in those extensions.
export function extensionsPattern(extensions: string[]): RegExp {
  return new RegExp(`(${extensions.map(e => `${e.replace('.', '\\.')}`).join('|')})$`, 'i');
}

const relativePattern = /^\.\.?(?:[\\/]|$)/;

// "./x", "../x", "." and ".." are relative to the requesting directory. "x" and
// ".x" are not.
export function isRelativeSpecifier(specifier: string): boolean {
  return relativePattern.test(specifier);
}

// The directory itself first, then each parent up to the filesystem root.
export function ancestorDirectories(dir: string): string[] {
  let result: string[] = [];
  let candidate = resolve(dir);
  while (true) {
    result.push(candidate);
    let next = dirname(candidate);
    if (next === candidate) {
      break;
    }
    candidate = next;
  }
  return result;
}
