import { runGit } from './run-git'

/**
 * Replace the last commit with one including the staged changes.
 *
 * @param options - Amend options.
 * @param options.message - New message, the old one is kept when omitted.
 * @param options.noVerify - Skip the pre-commit and commit-msg hooks.
 */
export async function amendCommit(
  options: { noVerify?: boolean; message?: string } = {},
): Promise<void> {
  let args = ['commit', '--amend']
  if (options.message) {
    args.push('--message', options.message)
  } else {
    args.push('--no-edit')
  }
  if (options.noVerify) {
    args.push('--no-verify')
  }

  await runGit(args)
}
