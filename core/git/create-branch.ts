import { runGit } from './run-git'

/**
 * Create a branch and check it out.
 *
 * @param name - Branch name, expected to be validated by the caller.
 * @param options - Branch options.
 * @param options.base - Revision the branch starts from, HEAD when omitted.
 */
export async function createBranch(
  name: string,
  options: { base?: string } = {},
): Promise<void> {
  let args = ['checkout', '-b', name]
  if (options.base) {
    args.push(options.base)
  }

  await runGit(args)
}
