import { InvalidInputError } from '../core/errors/invalid-input-error'
import { readActionInput } from './read-action-input'

/**
 * Resolve a boolean setting: CLI flag first, then the action input.
 *
 * @param flag - Value parsed from the command line.
 * @param inputName - Action input consulted when the flag is absent.
 * @param fallback - Value used when neither is set.
 * @returns Resolved value.
 */
export function pickFlag(
  flag: unknown,
  inputName: string,
  fallback: boolean = false,
): boolean {
  if (typeof flag === 'boolean') {
    return flag
  }

  let raw = readActionInput(inputName)
  if (raw === undefined) {
    return fallback
  }

  let normalized = raw.toLowerCase()
  if (normalized === 'true' || normalized === 'false') {
    return normalized === 'true'
  }
  throw new InvalidInputError(
    `Input "${inputName}" must be "true" or "false", got "${raw}"`,
  )
}
