import type { TagListConfig } from '../types/tag-list-config'

import { DEFAULT_VERSION_PREFIX } from '../core/constants'
import { normalizeSortMode } from './normalize-sort-mode'
import { pickOption } from './pick-option'

/** Listing-related CLI flags as parsed by cac. */
export interface TagListFlags {
  versionPrefix?: unknown
  pattern?: unknown
  sort?: unknown
}

/**
 * Resolve tag listing settings from flags, action inputs and defaults.
 *
 * @param flags - Parsed CLI flags.
 * @returns Resolved configuration.
 */
export function resolveTagListConfig(flags: TagListFlags): TagListConfig {
  let config: TagListConfig = {
    versionPrefix:
      pickOption(flags.versionPrefix, 'version_prefix', { keepEmpty: true }) ??
      DEFAULT_VERSION_PREFIX,
    sort: normalizeSortMode(pickOption(flags.sort, 'sort')),
  }

  let pattern = pickOption(flags.pattern, 'pattern')
  if (pattern !== undefined && pattern !== '') {
    config.pattern = pattern
  }

  return config
}
