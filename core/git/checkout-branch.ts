import { runGit } from './run-git'

/**
 * Check out an existing branch.
 *
 * @param name - Branch name.
 * @param options - Checkout options.
 * @param options.force - Discard local changes.
 */
export async function checkoutBranch(
  name: string,
  options: { force?: boolean } = {},
): Promise<void> {
  let args = ['checkout']
  if (options.force) {
    args.push('--force')
  }
  args.push(name)

  await runGit(args)
}
