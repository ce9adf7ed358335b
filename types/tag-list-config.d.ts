import type { SortMode } from './sort-mode'

/** Resolved configuration for listing tags. */
export interface TagListConfig {
  /** Prefix stripped from tags for version ordering. */
  versionPrefix: string

  /** Optional glob filter. */
  pattern?: string

  /** Requested ordering. */
  sort: SortMode
}
