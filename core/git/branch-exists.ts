import { runGit } from './run-git'

/**
 * Check whether a local branch with exactly this name exists.
 *
 * @param name - Branch name.
 * @returns True when the branch exists.
 */
export async function branchExists(name: string): Promise<boolean> {
  let output = await runGit([
    'for-each-ref',
    '--format=%(refname:lstrip=2)',
    `refs/heads/${name}`,
  ])
  return output.split('\n').some(line => line.trim() === name)
}
