import type { SortMode } from '../types/sort-mode'

import { InvalidInputError } from '../core/errors/invalid-input-error'

/**
 * Normalizes the sort option.
 *
 * @param mode - Raw sort option.
 * @returns Normalized sort mode, `alphabetic` when not set.
 */
export function normalizeSortMode(mode: undefined | string): SortMode {
  let normalized = (mode ?? 'alphabetic').toLowerCase()
  if (
    normalized === 'alphabetic' ||
    normalized === 'version' ||
    normalized === 'date'
  ) {
    return normalized
  }
  throw new InvalidInputError(
    `Invalid sort "${mode}". Expected "alphabetic", "version", or "date".`,
  )
}
