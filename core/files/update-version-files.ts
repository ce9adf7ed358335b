import { writeFile, readFile } from 'node:fs/promises'

import type { VersionFileUpdate } from '../../types/version-file-update'

import { InvalidVersionFormatError } from '../errors/invalid-version-format-error'
import { InvalidInputError } from '../errors/invalid-input-error'
import { isMissingFileError } from '../fs/is-missing-file-error'
import { detectVersionFileKind } from './detect-version-file-kind'
import { setTextVersion } from './set-text-version'
import { setYamlVersion } from './set-yaml-version'
import { setJsonVersion } from './set-json-version'

/** Options for bumping versions in files. */
interface UpdateVersionFilesOptions {
  /** Write `1.2.3` instead of `v1.2.3`. Defaults to true. */
  stripPrefix?: boolean
}

/**
 * Write a version into each of the given files.
 *
 * YAML and JSON files get their top-level `version` replaced, any other file
 * has its `version = x.y.z` style assignments rewritten. Files that are
 * missing or contain no version are reported as not updated.
 *
 * @param files - Paths of the files to update.
 * @param version - Version in `v1.2.3` or `1.2.3` form.
 * @param options - Update options.
 * @returns One entry per file, in input order.
 */
export async function updateVersionFiles(
  files: string[],
  version: string,
  options: UpdateVersionFilesOptions = {},
): Promise<VersionFileUpdate[]> {
  if (!/^v?\d+\.\d+\.\d+$/u.test(version)) {
    throw new InvalidVersionFormatError(version, '[v]')
  }

  if (files.length === 0) {
    throw new InvalidInputError('No files specified to update')
  }

  let value = (options.stripPrefix ?? true) ? version.replace(/^v/u, '') : version
  let results: VersionFileUpdate[] = []

  for (let file of files) {
    results.push(await updateVersionFile(file, value))
  }

  return results
}

/**
 * Update a single file.
 *
 * @param file - Path of the file.
 * @param value - Version value to write.
 * @returns Outcome for the file.
 */
async function updateVersionFile(
  file: string,
  value: string,
): Promise<VersionFileUpdate> {
  let content: string
  try {
    content = await readFile(file, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) {
      return { reason: 'File not found', updated: false, file }
    }
    throw error
  }

  let updated = applyVersion(file, content, value)
  if (updated === null) {
    return { reason: 'No version field found', updated: false, file }
  }

  await writeFile(file, updated, 'utf8')
  return { updated: true, file }
}

/**
 * Produce the updated content with the strategy matching the file type.
 *
 * @param file - Path of the file.
 * @param content - Current content.
 * @param value - Version value to write.
 * @returns Updated content or null when no version field was found.
 */
function applyVersion(
  file: string,
  content: string,
  value: string,
): string | null {
  switch (detectVersionFileKind(file)) {
    case 'yaml':
      return setYamlVersion(content, value)
    case 'json':
      return setJsonVersion(content, value)
    case 'text': {
      let result = setTextVersion(content, value)
      return result.count > 0 ? result.content : null
    }
  }
}
