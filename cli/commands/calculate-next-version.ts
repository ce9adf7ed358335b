import type { VersionQueryResult } from '../../types/version-query-result'
import type { VersionConfig } from '../../types/version-config'

import { extractBranchVersion } from '../../core/versions/extract-branch-version'
import { parseSemanticVersion } from '../../core/versions/parse-semantic-version'
import { resolveVersion } from '../../core/versions/resolve-version'
import { getCurrentBranch } from '../../core/git/get-current-branch'
import { getLatestTag } from '../../core/git/get-latest-tag'
import { countCommits } from '../../core/git/count-commits'

/** Version calculation result with the data it was derived from. */
export interface NextVersionReport {
  /** Where the current version came from. */
  source: 'release-branch' | 'default' | 'tag'

  /** Latest tag matching the pattern, null when unused or absent. */
  latestTag: string | null

  /** Checked out branch, null when the branch was not consulted. */
  branch: string | null

  /** Resolved versions. */
  result: VersionQueryResult
}

/**
 * Query the repository and compute the current and next version.
 *
 * On a `release/<version>` branch the branch version wins and the commit count
 * is 0, so commits added by the release process do not move the version.
 *
 * @param config - Resolved version settings.
 * @returns Resolved versions and their source.
 */
export async function calculateNextVersion(
  config: VersionConfig,
): Promise<NextVersionReport> {
  let { ignoreReleaseBranch, defaultVersion, versionPrefix, tagPattern } =
    config

  /** Fail on a malformed default before touching the repository. */
  parseSemanticVersion(defaultVersion, versionPrefix)

  let branch: string | null = null
  if (!ignoreReleaseBranch) {
    branch = await getCurrentBranch()
    let branchVersion = extractBranchVersion(branch, versionPrefix)
    if (branchVersion) {
      return {
        result: {
          currentVersion: branchVersion,
          nextVersion: branchVersion,
          commitCount: 0,
        },
        source: 'release-branch',
        latestTag: null,
        branch,
      }
    }
  }

  let latestTag = await getLatestTag(tagPattern)
  let commitCount = await countCommits(latestTag)
  let result = resolveVersion({
    defaultVersion,
    versionPrefix,
    commitCount,
    latestTag,
  })

  return { source: latestTag ? 'tag' : 'default', latestTag, result, branch }
}
