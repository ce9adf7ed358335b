import { runGit } from './run-git'

/**
 * Name of the checked out branch (`HEAD` when detached).
 *
 * @returns Branch name.
 */
export async function getCurrentBranch(): Promise<string> {
  let output = await runGit(['rev-parse', '--abbrev-ref', 'HEAD'])
  return output.trim()
}
