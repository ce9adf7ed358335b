import type { CommitRecord } from '../../types/commit-record'

import { runGit } from './run-git'

/** Hash, author, date and subject, NUL-separated. */
let FORMAT = '%H%x00%an%x00%aI%x00%s'

/** Filters for listing commits. */
export interface ListCommitsOptions {
  /** Only commits by authors matching this pattern. */
  author?: string

  /** Only commits after this date. */
  since?: string

  /** Only commits before this date. */
  until?: string

  /** Only commits touching this path. */
  path?: string

  /** Maximum number of commits. */
  limit: number
}

/**
 * List commits reachable from HEAD, newest first.
 *
 * @param options - Filters.
 * @returns Commit records.
 */
export async function listCommits(
  options: ListCommitsOptions,
): Promise<CommitRecord[]> {
  let args = ['log', `--max-count=${options.limit}`, `--format=${FORMAT}`]
  if (options.author) {
    args.push(`--author=${options.author}`)
  }
  if (options.since) {
    args.push(`--since=${options.since}`)
  }
  if (options.until) {
    args.push(`--until=${options.until}`)
  }
  if (options.path) {
    args.push('--', options.path)
  }

  let output = await runGit(args)
  let commits: CommitRecord[] = []

  for (let line of output.split('\n')) {
    let [hash = '', author = '', date = '', subject = ''] = line.split('\0')
    if (!hash.trim()) {
      continue
    }
    commits.push({ hash: hash.trim(), subject, author, date })
  }

  return commits
}
