import { writeFile, readFile } from 'node:fs/promises'

import type { ChangelogSection } from '../../types/changelog-section'

import { isMissingFileError } from '../../core/fs/is-missing-file-error'
import { updateChangelog } from '../../core/changelog/update-changelog'

/**
 * Write a section into a changelog file, creating the file when missing.
 *
 * @param file - Path of the changelog.
 * @param section - Section to write.
 */
export async function writeChangelog(
  file: string,
  section: ChangelogSection,
): Promise<void> {
  let existing = ''
  try {
    existing = await readFile(file, 'utf8')
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error
    }
  }

  await writeFile(file, updateChangelog(existing, section), 'utf8')
}
