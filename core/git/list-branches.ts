import { runGit } from './run-git'

/**
 * List branch names in the order Git reports them.
 *
 * Remote branches are named `<remote>/<branch>`; symbolic `HEAD` refs of
 * remotes are left out.
 *
 * @param options - Listing options.
 * @param options.includeRemote - Also list remote-tracking branches.
 * @returns Branch names.
 */
export async function listBranches(
  options: { includeRemote?: boolean } = {},
): Promise<string[]> {
  let refs = options.includeRemote
    ? ['refs/heads', 'refs/remotes']
    : ['refs/heads']
  let output = await runGit([
    'for-each-ref',
    '--format=%(refname:lstrip=2)',
    ...refs,
  ])

  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '' && !line.endsWith('/HEAD'))
}
