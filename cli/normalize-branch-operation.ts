import type { BranchOperation } from '../types/branch-operation'

import { InvalidInputError } from '../core/errors/invalid-input-error'

let OPERATIONS = new Set<string>([
  'checkout',
  'create',
  'delete',
  'list',
  'push',
])

/**
 * Normalizes the branch operation argument.
 *
 * @param operation - Raw operation name.
 * @returns Normalized operation.
 */
export function normalizeBranchOperation(
  operation: undefined | string,
): BranchOperation {
  let normalized = (operation ?? '').toLowerCase()
  if (isBranchOperation(normalized)) {
    return normalized
  }
  throw new InvalidInputError(
    `Invalid operation "${operation}". Expected "create", "delete", "checkout", "push", or "list".`,
  )
}

/**
 * Narrow a string to a known branch operation.
 *
 * @param value - Lower-cased operation name.
 * @returns True when the value names an operation.
 */
function isBranchOperation(value: string): value is BranchOperation {
  return OPERATIONS.has(value)
}
