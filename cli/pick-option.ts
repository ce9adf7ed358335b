import type { ReadActionInputOptions } from './read-action-input'

import { readActionInput } from './read-action-input'

/**
 * Resolve a string setting: CLI flag first, then the action input.
 *
 * Flag values are stringified since the argument parser turns numeric-looking
 * values into numbers.
 *
 * @param flag - Value parsed from the command line.
 * @param inputName - Action input consulted when the flag is absent.
 * @param options - How the action input is read.
 * @returns Resolved value or undefined.
 */
export function pickOption(
  flag: unknown,
  inputName: string,
  options: ReadActionInputOptions = {},
): undefined | string {
  if (flag !== undefined && flag !== null && typeof flag !== 'boolean') {
    return String(flag)
  }
  return readActionInput(inputName, options)
}
