import type { TagOperation } from '../types/tag-operation'

import { InvalidInputError } from '../core/errors/invalid-input-error'

let OPERATIONS = new Set<string>(['create', 'delete', 'check', 'list', 'push'])

/**
 * Normalizes the tag operation argument.
 *
 * @param operation - Raw operation name.
 * @returns Normalized operation.
 */
export function normalizeTagOperation(
  operation: undefined | string,
): TagOperation {
  let normalized = (operation ?? '').toLowerCase()
  if (isTagOperation(normalized)) {
    return normalized
  }
  throw new InvalidInputError(
    `Invalid operation "${operation}". Expected "create", "delete", "push", "check", or "list".`,
  )
}

/**
 * Narrow a string to a known tag operation.
 *
 * @param value - Lower-cased operation name.
 * @returns True when the value names an operation.
 */
function isTagOperation(value: string): value is TagOperation {
  return OPERATIONS.has(value)
}
