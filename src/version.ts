/**
 * @module version
 *
 * Library version, kept in step with `package.json`.
 */

const MAJOR = 0;
const MINOR = 1;
const BUILD = 0;

export function getMajorVersion(): number {
  return MAJOR;
}

export function getMinorVersion(): number {
  return MINOR;
}

export function getBuildNumber(): number {
  return BUILD;
}

/** `"major.minor.build"`. */
export function version(): string {
  return `${MAJOR}.${MINOR}.${BUILD}`;
}
