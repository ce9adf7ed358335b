import type { VersionQueryResult } from '../../types/version-query-result'
import type { SemanticVersion } from '../../types/semantic-version'

import { InvalidInputError } from '../errors/invalid-input-error'
import { parseSemanticVersion } from './parse-semantic-version'

/** Inputs of a version resolution. */
interface ResolveVersionOptions {
  /** Latest tag matching the tag pattern, absent when none exists. */
  latestTag?: string | null

  /**
   * Commits since `latestTag`, or total commits when there is no tag.
   */
  commitCount: number

  /** Version used when there is no tag. */
  defaultVersion: string

  /** Prefix stripped from the tag before parsing. */
  versionPrefix: string
}

/**
 * Derive the current and next version from the latest tag.
 *
 * The patch component of the next version is the tag's patch plus the number
 * of commits since the tag; major and minor are carried over unchanged and
 * patch is never reset. Without a tag the default version is both current and
 * next version and the commit count is passed through.
 *
 * @example
 *   resolveVersion({
 *     latestTag: 'v1.0.16',
 *     defaultVersion: 'v0.1.0',
 *     versionPrefix: 'v',
 *     commitCount: 3,
 *   })
 *   // nextVersion: v1.0.19
 *
 * @param options - Resolution inputs.
 * @returns Current version, next version and commit count.
 * @throws {InvalidVersionFormatError} When the tag or default is malformed.
 * @throws {InvalidInputError} When the commit count is negative.
 */
export function resolveVersion(
  options: ResolveVersionOptions,
): VersionQueryResult {
  let { versionPrefix, defaultVersion, commitCount, latestTag } = options

  if (!Number.isSafeInteger(commitCount) || commitCount < 0) {
    throw new InvalidInputError(
      `Commit count must be a non-negative integer, got ${commitCount}`,
    )
  }

  if (latestTag === undefined || latestTag === null) {
    let currentVersion = parseSemanticVersion(defaultVersion, versionPrefix)
    return { nextVersion: currentVersion, currentVersion, commitCount }
  }

  let currentVersion = parseSemanticVersion(latestTag, versionPrefix)
  let nextVersion: SemanticVersion = {
    ...currentVersion,
    patch: currentVersion.patch + commitCount,
  }

  return { currentVersion, nextVersion, commitCount }
}
