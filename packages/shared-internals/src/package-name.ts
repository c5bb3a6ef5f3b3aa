import { isAbsolute } from 'path';
import { isRelativeSpecifier } from './paths';

export interface PackageSpecifier {
  name: string;
  // whatever follows the package name, without a leading slash. Empty when the
  // request names the package itself.
  subpath: string;
}

export function parsePackageSpecifier(specifier: string): PackageSpecifier | undefined {
  if (specifier.length === 0 || isRelativeSpecifier(specifier) || isAbsolute(specifier)) {
    // Does not refer to a package
    return;
  }
  let parts = specifier.split('/');
  let nameParts = specifier[0] === '@' ? 2 : 1;
  if (parts.length < nameParts || parts.slice(0, nameParts).some(part => part.length === 0)) {
    return;
  }
  return {
    name: parts.slice(0, nameParts).join('/'),
    subpath: parts.slice(nameParts).join('/'),
  };
}

export default function absolutePackageName(specifier: string): string | undefined {
  return parsePackageSpecifier(specifier)?.name;
}
