/** Outcome of a branch operation, mapped one-to-one onto action outputs. */
export interface BranchOperationResult {
  /** Branch checked out after the operation. */
  currentBranch: string

  /** Whether the operation did what was asked. */
  succeeded: boolean

  /** Listed branch names, only for the list operation. */
  branches?: string[]

  /** Explanation shown when the operation did not succeed. */
  reason?: string
}
