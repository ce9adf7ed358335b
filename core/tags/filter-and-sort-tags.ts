import type { SemanticVersion } from '../../types/semantic-version'
import type { TagListConfig } from '../../types/tag-list-config'
import type { TagRecord } from '../../types/tag-record'

import { InvalidVersionFormatError } from '../errors/invalid-version-format-error'
import { compareSemanticVersions } from '../versions/compare-semantic-versions'
import { parseSemanticVersion } from '../versions/parse-semantic-version'
import { compileGlobPattern } from './compile-glob-pattern'

/**
 * Filter tags by an optional glob and order them.
 *
 * Orderings:
 *
 * - `alphabetic`: ascending by code unit.
 * - `version`: ascending by `(major, minor, patch)`; names that do not parse
 *   as `{versionPrefix}X.Y.Z` follow all versions, alphabetically.
 * - `date`: ascending by creation time; undated tags come first,
 *   alphabetically, and equal dates fall back to alphabetic order.
 *
 * @example
 *   filterAndSortTags(
 *     [{ name: 'v1.9.0' }, { name: 'v1.10.0' }, { name: 'v1.2.0' }],
 *     { sort: 'version', versionPrefix: 'v' },
 *   )
 *   // ['v1.2.0', 'v1.9.0', 'v1.10.0']
 *
 * @param tags - Tags to order.
 * @param config - Filter and ordering settings.
 * @returns Ordered tag names.
 * @throws {InvalidPatternError} When the pattern uses unsupported syntax.
 */
export function filterAndSortTags(
  tags: TagRecord[],
  config: TagListConfig,
): string[] {
  let selected = tags
  if (config.pattern !== undefined) {
    let regex = compileGlobPattern(config.pattern)
    selected = tags.filter(tag => regex.test(tag.name))
  }

  switch (config.sort) {
    case 'version':
      return sortByVersion(selected, config.versionPrefix)
    case 'date':
      return sortByDate(selected)
    case 'alphabetic':
      return selected.map(tag => tag.name).sort(compareNames)
  }
}

/**
 * Compare two names by code unit, independent of locale.
 *
 * @param a - Left name.
 * @param b - Right name.
 * @returns Sort order.
 */
function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1
  }
  return a > b ? 1 : 0
}

/**
 * Order tags by version, unparsable names last.
 *
 * @param tags - Tags to order.
 * @param versionPrefix - Prefix expected in front of the version.
 * @returns Ordered tag names.
 */
function sortByVersion(tags: TagRecord[], versionPrefix: string): string[] {
  let entries = tags.map(tag => ({
    version: tryParse(tag.name, versionPrefix),
    name: tag.name,
  }))

  entries.sort((a, b) => {
    if (a.version && b.version) {
      return (
        compareSemanticVersions(a.version, b.version) ||
        compareNames(a.name, b.name)
      )
    }
    if (a.version) {
      return -1
    }
    if (b.version) {
      return 1
    }
    return compareNames(a.name, b.name)
  })

  return entries.map(entry => entry.name)
}

/**
 * Order tags by creation time, undated tags first.
 *
 * @param tags - Tags to order.
 * @returns Ordered tag names.
 */
function sortByDate(tags: TagRecord[]): string[] {
  let entries = tags.map(tag => ({
    time: tag.creationTimestamp?.getTime() ?? null,
    name: tag.name,
  }))

  entries.sort((a, b) => {
    if (a.time !== null && b.time !== null) {
      return a.time - b.time || compareNames(a.name, b.name)
    }
    if (a.time !== null) {
      return 1
    }
    if (b.time !== null) {
      return -1
    }
    return compareNames(a.name, b.name)
  })

  return entries.map(entry => entry.name)
}

/**
 * Parse a tag name, mapping format errors to null.
 *
 * @param name - Tag name.
 * @param versionPrefix - Expected prefix.
 * @returns Parsed version or null.
 */
function tryParse(name: string, versionPrefix: string): SemanticVersion | null {
  try {
    return parseSemanticVersion(name, versionPrefix)
  } catch (error) {
    if (error instanceof InvalidVersionFormatError) {
      return null
    }
    throw error
  }
}
