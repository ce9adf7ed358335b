import semver from 'semver'

import type { SemanticVersion } from '../../types/semantic-version'

/**
 * Compare two versions by `(major, minor, patch)`, ignoring prefixes.
 *
 * @param a - Left version.
 * @param b - Right version.
 * @returns Negative when `a` is lower, positive when higher, 0 when equal.
 */
export function compareSemanticVersions(
  a: SemanticVersion,
  b: SemanticVersion,
): -1 | 0 | 1 {
  return semver.compare(
    `${a.major}.${a.minor}.${a.patch}`,
    `${b.major}.${b.minor}.${b.patch}`,
  )
}
