import { VarietyError, VarietyErrorCode } from '../utils/errors.js';

const MAX_PACKAGE_NAME_LENGTH = 214;
const PACKAGE_NAME_PATTERN = /^(?:@[a-z0-9~-][a-z0-9._~-]*\/)?[a-z0-9~][a-z0-9._~-]*$/;
const VERSION_SPEC_PATTERN = /^[0-9A-Za-z.^~<>=*+-]{1,64}$/;
const CAPABILITY_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]{0,63}$/;

export function isValidPackageName(name: string): boolean {
  return name.length <= MAX_PACKAGE_NAME_LENGTH && PACKAGE_NAME_PATTERN.test(name);
}

/**
 * npm naming allow-list: optional `@scope/`, lower-case `[a-z0-9-._~]`, no
 * leading `.`, `_` or `-` (which npm would read as a flag), no further path
 * segments.
 *
 * @throws {VarietyError} `INVALID_ARGUMENT`
 */
export function assertValidPackageName(name: string): string {
  if (!isValidPackageName(name)) {
    throw new VarietyError(
      `Invalid package name: '${name}'`,
      VarietyErrorCode.INVALID_ARGUMENT,
      { packageName: name },
      'PackageNames',
    );
  }
  return name;
}

/** @throws {VarietyError} `INVALID_ARGUMENT` */
export function assertValidVersionSpec(version: string): string {
  if (!VERSION_SPEC_PATTERN.test(version)) {
    throw new VarietyError(
      `Invalid version spec: '${version}'`,
      VarietyErrorCode.INVALID_ARGUMENT,
      { version },
      'PackageNames',
    );
  }
  return version;
}

/**
 * Trims and lower-cases a capability name, then checks it against
 * `^[a-z0-9][a-z0-9_.-]{0,63}$`. Returns the normalized name.
 *
 * @throws {VarietyError} `INVALID_ARGUMENT`
 */
export function assertValidCapabilityName(raw: string): string {
  const name = raw.trim().toLowerCase();
  if (!CAPABILITY_NAME_PATTERN.test(name)) {
    throw new VarietyError(
      `Invalid capability name: '${raw}'`,
      VarietyErrorCode.INVALID_ARGUMENT,
      { capability: raw },
      'PackageNames',
    );
  }
  return name;
}
