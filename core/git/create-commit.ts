import { runGit } from './run-git'

/** Options for recording a commit. */
export interface CreateCommitOptions {
  /** Record the commit even when nothing is staged. */
  allowEmpty?: boolean

  /** Skip the pre-commit and commit-msg hooks. */
  noVerify?: boolean
}

/**
 * Record the staged changes as a new commit.
 *
 * @param message - Commit message.
 * @param options - Commit options.
 */
export async function createCommit(
  message: string,
  options: CreateCommitOptions = {},
): Promise<void> {
  let args = ['commit', '--message', message]
  if (options.allowEmpty) {
    args.push('--allow-empty')
  }
  if (options.noVerify) {
    args.push('--no-verify')
  }

  await runGit(args)
}
