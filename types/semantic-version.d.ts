/**
 * Semantic version with an optional textual prefix.
 *
 * Textual form is always `{prefix}{major}.{minor}.{patch}`.
 */
export interface SemanticVersion {
  /** Prefix in front of the numbers (e.g., 'v'), may be empty. */
  readonly prefix: string

  /** Major component. */
  readonly major: number

  /** Minor component. */
  readonly minor: number

  /** Patch component. */
  readonly patch: number
}
