// The parts of package.json that the runtime reads. Everything else is carried
// along untouched.
export interface PackageInfo {
  name?: string;
  version?: string;
  main?: string;
  [key: string]: unknown;
}

function optionalString(record: Record<string, unknown>, field: string, filename: string): string | undefined {
  let value = record[field];
  if (value !== undefined && typeof value !== 'string') {
    throw new Error(`${filename}: expected "${field}" to be a string`);
  }
  return value;
}

export function asPackageInfo(json: unknown, filename: string): PackageInfo {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new Error(`${filename} does not contain a JSON object`);
  }
  let record: Record<string, unknown> = { ...json };
  return {
    ...record,
    name: optionalString(record, 'name', filename),
    version: optionalString(record, 'version', filename),
    main: optionalString(record, 'main', filename),
  };
}
