import { DEFAULT_REMOTE } from '../constants'
import { runGit } from './run-git'

/**
 * Push a single tag to the remote.
 *
 * @param name - Tag name.
 * @param options - Push options.
 * @param options.force - Overwrite the tag on the remote.
 */
export async function pushTag(
  name: string,
  options: { force?: boolean } = {},
): Promise<void> {
  let args = ['push', DEFAULT_REMOTE]
  if (options.force) {
    args.push('--force')
  }
  args.push(`refs/tags/${name}`)

  await runGit(args)
}
