import type { CommitRecord } from './commit-record'

/** Outcome of a commit operation, mapped one-to-one onto action outputs. */
export interface CommitOperationResult {
  /** Listed commits, newest first, only for the list operation. */
  commits?: CommitRecord[]

  /** Hash of the created or amended commit. */
  commitHash?: string

  /** Whether the operation did what was asked. */
  succeeded: boolean

  /** Explanation shown when the operation did not succeed. */
  reason?: string
}
