/**
 * Version information, read from the package manifest beside `src/` and
 * `dist/`
 */

import { readFileSync } from 'node:fs';

export interface VersionInfo {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: string | undefined;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  throw new Error('package.json has no version');
}

/**
 * Split a semver string into its components.
 *
 * @throws Error when `version` is not `MAJOR.MINOR.PATCH[-PRERELEASE]`
 */
export function parseVersion(version: string): VersionInfo {
  const match = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?$/.exec(version);
  if (!match) {
    throw new Error(`Invalid version: ${version}`);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4],
  };
}

/** Version string from package.json */
export const VERSION: string = readVersion();

export const VERSION_INFO: VersionInfo = parseVersion(VERSION);
