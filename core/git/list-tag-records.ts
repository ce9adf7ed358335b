import type { TagRecord } from '../../types/tag-record'

import { runGit } from './run-git'

/** Name, creation date and subject, NUL-separated. */
let FORMAT = '%(refname:lstrip=2)%00%(creatordate:iso-strict)%00%(contents:subject)'

/**
 * List every tag in the repository.
 *
 * @param options - Listing options.
 * @param options.includeDates - Fill in `creationTimestamp` for each tag.
 * @returns Tag records in the order Git reports them.
 */
export async function listTagRecords(
  options: { includeDates?: boolean } = {},
): Promise<TagRecord[]> {
  let output = await runGit(['for-each-ref', `--format=${FORMAT}`, 'refs/tags'])
  let records: TagRecord[] = []

  for (let line of output.split('\n')) {
    let [name = '', date = '', subject = ''] = line.split('\0')
    if (!name.trim()) {
      continue
    }

    let record: TagRecord = {
      annotationMessage: subject.trim() || null,
      name: name.trim(),
    }

    if (options.includeDates) {
      let parsed = date ? new Date(date) : null
      record.creationTimestamp =
        parsed && !Number.isNaN(parsed.getTime()) ? parsed : null
    }

    records.push(record)
  }

  return records
}
