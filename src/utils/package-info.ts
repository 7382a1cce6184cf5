/**
 * Package metadata read from the package.json shipped beside the sources.
 *
 * The file sits two levels above this module both in `src/utils` and in
 * `dist/utils`.
 */

import { fileURLToPath } from 'node:url';
import { safeReadTextFileSync } from './safe-fs.js';

/** Reported when package.json is absent or carries no version. */
export const UNKNOWN_VERSION = '(unknown)';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

/**
 * Reads the `version` field of a package.json file.
 *
 * @param packageJsonUrl - Location of the file. Defaults to this package's own.
 * @returns The version, or {@link UNKNOWN_VERSION} if the file is missing or
 * has no string version.
 * @throws SyntaxError if the file is not valid JSON.
 */
export function readPackageVersion(packageJsonUrl: URL = PACKAGE_JSON_URL): string {
  let raw: string;
  try {
    raw = safeReadTextFileSync(fileURLToPath(packageJsonUrl));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return UNKNOWN_VERSION;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return UNKNOWN_VERSION;
}

/** This package's version, read once at load. */
export const VERSION = readPackageVersion();
