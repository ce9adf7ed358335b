import type { CommitOperation } from '../types/commit-operation'

import { InvalidInputError } from '../core/errors/invalid-input-error'

let OPERATIONS = new Set<string>(['create', 'amend', 'list'])

/**
 * Normalizes the commit operation argument.
 *
 * @param operation - Raw operation name.
 * @returns Normalized operation.
 */
export function normalizeCommitOperation(
  operation: undefined | string,
): CommitOperation {
  let normalized = (operation ?? '').toLowerCase()
  if (isCommitOperation(normalized)) {
    return normalized
  }
  throw new InvalidInputError(
    `Invalid operation "${operation}". Expected "create", "amend", or "list".`,
  )
}

/**
 * Narrow a string to a known commit operation.
 *
 * @param value - Lower-cased operation name.
 * @returns True when the value names an operation.
 */
function isCommitOperation(value: string): value is CommitOperation {
  return OPERATIONS.has(value)
}
