import { runGit } from './run-git'

/**
 * Check whether the index differs from HEAD.
 *
 * @returns True when something is staged.
 */
export async function hasStagedChanges(): Promise<boolean> {
  let output = await runGit(['diff', '--cached', '--name-only'])
  return output.trim() !== ''
}
