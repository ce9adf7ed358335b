/** Outcome of bumping the version inside a single file. */
export interface VersionFileUpdate {
  /** Why the file was left untouched. */
  reason?: string

  /** Whether the file was rewritten. */
  updated: boolean

  /** Path of the file. */
  file: string
}
