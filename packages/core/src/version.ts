/**
 * polybridge version constants.
 *
 * Reads the version from the @polybridge/core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Full version string (e.g., "0.1.0-beta") */
export const POLYBRIDGE_VERSION: string = readPackageVersion();

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.1.0-beta" → "0.1.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
