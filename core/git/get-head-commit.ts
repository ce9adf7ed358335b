import { runGit } from './run-git'

/**
 * Full hash of the commit HEAD points at.
 *
 * @returns Commit hash.
 */
export async function getHeadCommit(): Promise<string> {
  let output = await runGit(['rev-parse', 'HEAD'])
  return output.trim()
}
