import { DEFAULT_REMOTE } from '../constants'
import { runGit } from './run-git'

/**
 * Delete a tag locally, on the remote, or both.
 *
 * @param name - Tag name.
 * @param options - Delete options.
 * @param options.local - Delete the local tag. Defaults to true.
 * @param options.remote - Delete the tag on the remote. Defaults to false.
 */
export async function deleteTag(
  name: string,
  options: { remote?: boolean; local?: boolean } = {},
): Promise<void> {
  if (options.local ?? true) {
    await runGit(['tag', '--delete', name])
  }

  if (options.remote) {
    await runGit(['push', DEFAULT_REMOTE, `:refs/tags/${name}`])
  }
}
