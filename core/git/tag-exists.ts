import { runGit } from './run-git'

/**
 * Check whether a local tag with exactly this name exists.
 *
 * @param name - Tag name.
 * @returns True when the tag exists.
 */
export async function tagExists(name: string): Promise<boolean> {
  let output = await runGit(['tag', '--list', name])
  return output.split('\n').some(line => line.trim() === name)
}
