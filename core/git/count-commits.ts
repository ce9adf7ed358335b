import { InvalidInputError } from '../errors/invalid-input-error'
import { runGit } from './run-git'

/**
 * Count commits reachable from HEAD, optionally only those after a tag.
 *
 * @param since - Tag or revision to count from; all commits when omitted.
 * @returns Number of commits.
 */
export async function countCommits(since?: string | null): Promise<number> {
  let range = since ? `${since}..HEAD` : 'HEAD'
  let output = (await runGit(['rev-list', '--count', range])).trim()

  if (!/^\d+$/u.test(output)) {
    throw new InvalidInputError(`Unexpected commit count output: "${output}"`)
  }

  return Number.parseInt(output, 10)
}
