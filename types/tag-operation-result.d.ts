/** Outcome of a tag operation, mapped one-to-one onto action outputs. */
export interface TagOperationResult {
  /** Annotation message of the checked tag, empty when not annotated. */
  tagMessage: string

  /** Whether the operation did what was asked. */
  succeeded: boolean

  /** Whether the tag existed when the operation started. */
  tagExists: boolean

  /** Listed tag names, only for the list operation. */
  tags?: string[]

  /** Explanation shown when the operation did not succeed. */
  reason?: string
}
