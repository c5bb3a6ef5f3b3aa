import { delimiter, isAbsolute, resolve } from 'path';
import assertNever from 'assert-never';
import { UsageError } from './errors';

// How `require.breakpoint()` finds a debugger. Decided once, when the context
// is created.
export type DebuggerConfig = { type: 'default' } | { type: 'named'; request: string } | { type: 'disabled' };

export default interface Options {
  // When true the context starts with no resolvers at all; callers install
  // their own in `context.resolvers`.
  bare?: boolean;

  // The directory that top-level requests resolve from. Defaults to the
  // current working directory.
  mainDir?: string;

  // Extra directories searched for bare requests after the modules
  // directories. Defaults to the entries of NODULE_PATH.
  searchPaths?: string[];

  // Name of the per-directory folder holding installed packages.
  modulesDirectory?: string;

  // Entry file of a package directory whose package.json has no usable
  // `main`.
  packageMain?: string;

  // A file inside a package directory whose content names the directory the
  // package really lives in.
  linkFile?: string;

  scriptExtensions?: string[];

  transformScript?: (source: string, filename: string) => string;

  // Defaults to whatever NODULE_BREAKPOINT says.
  debugger?: DebuggerConfig;
}

export type CoreOptionsType = Required<Omit<Options, 'transformScript'>> & Pick<Options, 'transformScript'>;

type Env = Record<string, string | undefined>;

// NODULE_BREAKPOINT unset or empty means the built-in debugger, "0" turns
// breakpoints off, and anything else is a request for a module whose
// `breakpoint()` takes over.
export function debuggerConfigFromEnv(env: Env = process.env): DebuggerConfig {
  let value = env['NODULE_BREAKPOINT'] ?? '';
  if (value === '') {
    return { type: 'default' };
  }
  if (value === '0') {
    return { type: 'disabled' };
  }
  return { type: 'named', request: value };
}

export function describeDebugger(config: DebuggerConfig): string {
  switch (config.type) {
    case 'default':
      return 'built-in debugger';
    case 'disabled':
      return 'disabled';
    case 'named':
      return `debugger module ${config.request}`;
    default:
      throw assertNever(config);
  }
}

export function optionsWithDefaults(options?: Options, env: Env = process.env): CoreOptionsType {
  if (options?.mainDir !== undefined && !isAbsolute(options.mainDir)) {
    throw new UsageError(`mainDir must be an absolute path, got ${options.mainDir}`);
  }
  if (options?.scriptExtensions?.some(ext => !ext.startsWith('.'))) {
    throw new UsageError(`scriptExtensions must each start with ".", got ${options.scriptExtensions.join(', ')}`);
  }

  return {
    bare: options?.bare ?? false,
    mainDir: options?.mainDir ?? resolve(process.cwd()),
    searchPaths: options?.searchPaths ?? (env['NODULE_PATH'] ?? '').split(delimiter).filter(Boolean),
    modulesDirectory: options?.modulesDirectory ?? 'node_modules',
    packageMain: options?.packageMain ?? 'index',
    linkFile: options?.linkFile ?? '.nodule-link',
    scriptExtensions: options?.scriptExtensions ?? ['.js', '.cjs'],
    transformScript: options?.transformScript,
    debugger: options?.debugger ?? debuggerConfigFromEnv(env),
  };
}
