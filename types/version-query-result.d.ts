import type { SemanticVersion } from './semantic-version'

/** Result of a version resolution. */
export interface VersionQueryResult {
  /** Latest tagged version, or the default version when no tag exists. */
  currentVersion: SemanticVersion

  /** Version the next release should carry. */
  nextVersion: SemanticVersion

  /** Commits since the current version's tag (total commits without tag). */
  commitCount: number
}
