/** A commit as reported by `git log`. */
export interface CommitRecord {
  /** Subject line of the commit message. */
  subject: string

  /** Author name. */
  author: string

  /** Author date in strict ISO 8601 form. */
  date: string

  /** Full commit hash. */
  hash: string
}
