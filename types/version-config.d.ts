/** Resolved configuration for the version calculation. */
export interface VersionConfig {
  /** Skip the `release/<version>` branch shortcut. */
  ignoreReleaseBranch: boolean

  /** Version used when no tag matches the pattern. */
  defaultVersion: string

  /** Prefix stripped from tags before parsing (e.g., 'v'). */
  versionPrefix: string

  /** Glob selecting candidate tags (e.g., 'v*'). */
  tagPattern: string
}
