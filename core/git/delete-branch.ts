import { DEFAULT_REMOTE } from '../constants'
import { runGit } from './run-git'

/** Options for deleting a branch. */
export interface DeleteBranchOptions {
  /** Delete the branch on the remote. Defaults to false. */
  remote?: boolean

  /** Delete even when not merged. Defaults to false. */
  force?: boolean

  /** Delete the local branch. Defaults to true. */
  local?: boolean
}

/**
 * Delete a branch locally, on the remote, or both.
 *
 * @param name - Branch name.
 * @param options - Delete options.
 */
export async function deleteBranch(
  name: string,
  options: DeleteBranchOptions = {},
): Promise<void> {
  if (options.local ?? true) {
    await runGit(['branch', options.force ? '-D' : '-d', name])
  }

  if (options.remote) {
    await runGit(['push', DEFAULT_REMOTE, '--delete', name])
  }
}
