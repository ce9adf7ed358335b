import { getInput } from '@actions/core'

/** Options for reading an action input. */
export interface ReadActionInputOptions {
  /**
   * Return `''` for an input that is set but empty, instead of treating it as
   * unset. Absent inputs still read as undefined.
   */
  keepEmpty?: boolean
}

/**
 * Read a GitHub Actions input (`INPUT_<NAME>`), treating empty as unset.
 *
 * @param name - Input name as declared in `action.yml`.
 * @param options - Read options.
 * @returns Trimmed value, or undefined when empty or absent.
 */
export function readActionInput(
  name: string,
  options: ReadActionInputOptions = {},
): undefined | string {
  let value = getInput(name)
  if (value !== '') {
    return value
  }

  let variable = `INPUT_${name.replaceAll(' ', '_').toUpperCase()}`
  return options.keepEmpty && process.env[variable] !== undefined
    ? ''
    : undefined
}
