import type { ChangelogSection } from '../../types/changelog-section'

import { InvalidInputError } from '../errors/invalid-input-error'
import { formatChangelogDate } from './format-changelog-date'

/** Matches the heading of a pending release section. */
let UNRELEASED_HEADING = /^## \*\*.*[Uu]nreleased\*\*/u

/**
 * Insert or replace the pending release section of a Markdown changelog.
 *
 * The first `## **… Unreleased**` section, heading and body, is replaced by
 * the new one. Without such a section the new one goes above the newest
 * released section, or at the end when there is none.
 *
 * Headings:
 *
 * - `unreleased`: `## **MM/DD/YYYY - v1.2.3 Unreleased**`
 * - `release`: `## **[(MM/DD/YYYY) - v1.2.3](…/releases/tag/v1.2.3)**`.
 *
 * @param existing - Current changelog content.
 * @param section - Section to write.
 * @returns Updated changelog, ending with a single newline.
 */
export function updateChangelog(
  existing: string,
  section: ChangelogSection,
): string {
  let notes = section.notes.trim()
  if (!notes) {
    throw new InvalidInputError('Changelog content must not be empty')
  }

  let block = [formatHeading(section), notes]
  let lines = existing === '' ? [] : existing.replace(/\n+$/u, '').split('\n')
  let result: string[] = []
  let replaced = false
  let skipping = false

  for (let line of lines) {
    if (skipping) {
      if (!line.startsWith('## ')) {
        continue
      }
      skipping = false
      result.push('')
    }

    if (!replaced && UNRELEASED_HEADING.test(line)) {
      result.push(...block)
      replaced = true
      skipping = true
      continue
    }

    result.push(line)
  }

  if (replaced) {
    return `${result.join('\n')}\n`
  }

  return `${insertSection(result, block).join('\n')}\n`
}

/**
 * Place a new section above the first existing `## ` section, or at the end
 * when the changelog has none.
 *
 * @param lines - Changelog lines.
 * @param block - Heading and body of the new section.
 * @returns Lines with the section inserted.
 */
function insertSection(lines: string[], block: string[]): string[] {
  let index = lines.findIndex(line => line.startsWith('## '))
  if (index !== -1) {
    return [...lines.slice(0, index), ...block, '', ...lines.slice(index)]
  }

  if (lines.length > 0 && lines.at(-1) !== '') {
    return [...lines, '', ...block]
  }
  return [...lines, ...block]
}

/**
 * Build the section heading for the requested mode.
 *
 * @param section - Section being written.
 * @returns Markdown heading line.
 */
function formatHeading(section: ChangelogSection): string {
  let date = formatChangelogDate(section.date)

  if (section.mode === 'unreleased') {
    return `## **${date} - ${section.version} Unreleased**`
  }

  if (!section.repository) {
    throw new InvalidInputError(
      'Repository is required to link a released changelog section',
    )
  }

  let url = `https://github.com/${section.repository}/releases/tag/${section.version}`
  return `## **[(${date}) - ${section.version}](${url})**`
}
