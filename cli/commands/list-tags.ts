import type { TagListConfig } from '../../types/tag-list-config'

import { filterAndSortTags } from '../../core/tags/filter-and-sort-tags'
import { compileGlobPattern } from '../../core/tags/compile-glob-pattern'
import { listTagRecords } from '../../core/git/list-tag-records'

/**
 * List repository tags, filtered and ordered.
 *
 * @param config - Resolved listing settings.
 * @returns Ordered tag names.
 */
export async function listTags(config: TagListConfig): Promise<string[]> {
  if (config.pattern !== undefined) {
    compileGlobPattern(config.pattern)
  }

  let records = await listTagRecords({ includeDates: config.sort === 'date' })
  return filterAndSortTags(records, config)
}
