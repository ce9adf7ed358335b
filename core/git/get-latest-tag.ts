import { runGit } from './run-git'

/**
 * Find the highest tag matching a pattern, ordered by Git's version sort.
 *
 * @param pattern - Glob passed to `git tag --list`.
 * @returns Tag name or null when no tag matches.
 */
export async function getLatestTag(pattern: string): Promise<string | null> {
  let output = await runGit(['tag', '--list', pattern, '--sort=-v:refname'])
  let [first] = output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
  return first ?? null
}
