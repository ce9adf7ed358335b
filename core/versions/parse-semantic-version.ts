import semver from 'semver'

import type { SemanticVersion } from '../../types/semantic-version'

import { InvalidVersionFormatError } from '../errors/invalid-version-format-error'

/**
 * Parse `{prefix}{major}.{minor}.{patch}` into a semantic version.
 *
 * Only plain three-part numeric versions are accepted: no pre-release or build
 * metadata, no leading zeros.
 *
 * @example
 *   parseSemanticVersion('v1.0.16', 'v')
 *   // { prefix: 'v', major: 1, minor: 0, patch: 16 }
 *
 * @param value - Raw version string, usually a tag name.
 * @param prefix - Prefix the value must start with.
 * @returns Parsed version.
 * @throws {InvalidVersionFormatError} When the value does not match.
 */
export function parseSemanticVersion(
  value: string,
  prefix: string = '',
): SemanticVersion {
  if (!value.startsWith(prefix)) {
    throw new InvalidVersionFormatError(value, prefix)
  }

  let remainder = value.slice(prefix.length)
  if (!/^\d+\.\d+\.\d+$/u.test(remainder)) {
    throw new InvalidVersionFormatError(value, prefix)
  }

  /** Rejects leading zeros and components beyond the safe integer range. */
  let parsed = semver.parse(remainder)
  if (!parsed) {
    throw new InvalidVersionFormatError(value, prefix)
  }

  return {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
    prefix,
  }
}
