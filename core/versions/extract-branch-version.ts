import type { SemanticVersion } from '../../types/semantic-version'

import { InvalidVersionFormatError } from '../errors/invalid-version-format-error'
import { parseSemanticVersion } from './parse-semantic-version'

/**
 * Read the version out of a release branch name such as `release/v1.0.364`.
 *
 * @param branch - Current branch name.
 * @param versionPrefix - Prefix the version in the branch name carries.
 * @returns Version encoded in the branch, or null for any other branch.
 */
export function extractBranchVersion(
  branch: string,
  versionPrefix: string,
): SemanticVersion | null {
  if (!branch.startsWith('release/')) {
    return null
  }

  try {
    return parseSemanticVersion(branch.slice('release/'.length), versionPrefix)
  } catch (error) {
    if (error instanceof InvalidVersionFormatError) {
      return null
    }
    throw error
  }
}
