import { InvalidInputError } from '../core/errors/invalid-input-error'
import { DEFAULT_COMMIT_LIMIT } from '../core/constants'

/**
 * Parse the number of commits to list.
 *
 * @param raw - Raw limit option.
 * @returns Positive limit, the default when not set.
 */
export function parseCommitLimit(raw: undefined | string): number {
  if (raw === undefined) {
    return DEFAULT_COMMIT_LIMIT
  }

  let limit = /^\d+$/u.test(raw) ? Number.parseInt(raw, 10) : Number.NaN
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw new InvalidInputError(
      `Invalid limit "${raw}". Expected a positive integer.`,
    )
  }
  return limit
}
