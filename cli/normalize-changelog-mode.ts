import type { ChangelogMode } from '../types/changelog-mode'

import { InvalidInputError } from '../core/errors/invalid-input-error'

/**
 * Normalizes the changelog mode option.
 *
 * @param mode - Raw mode option.
 * @returns Normalized mode, `unreleased` when not set.
 */
export function normalizeChangelogMode(mode: undefined | string): ChangelogMode {
  let normalized = (mode ?? 'unreleased').toLowerCase()
  if (normalized === 'unreleased' || normalized === 'release') {
    return normalized
  }
  throw new InvalidInputError(
    `Invalid mode "${mode}". Expected "unreleased" or "release".`,
  )
}
