export type { PackageInfo } from './metadata';
export { asPackageInfo } from './metadata';
export { explicitRelative, extensionsPattern, isRelativeSpecifier, ancestorDirectories } from './paths';
export { getOrCreate } from './get-or-create';
export { default as Package } from './package';
export { default as PackageCache } from './package-cache';
export { default as packageName, parsePackageSpecifier } from './package-name';
export type { PackageSpecifier } from './package-name';
