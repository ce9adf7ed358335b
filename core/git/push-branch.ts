import { DEFAULT_REMOTE } from '../constants'
import { runGit } from './run-git'

/**
 * Push a branch to the remote.
 *
 * @param name - Branch name.
 * @param options - Push options.
 * @param options.force - Overwrite the branch on the remote.
 */
export async function pushBranch(
  name: string,
  options: { force?: boolean } = {},
): Promise<void> {
  let args = ['push', DEFAULT_REMOTE]
  if (options.force) {
    args.push('--force')
  }
  args.push(name)

  await runGit(args)
}
