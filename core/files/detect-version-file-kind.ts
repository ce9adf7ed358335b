import { extname } from 'node:path'

/** How the version inside a file is located. */
export type VersionFileKind = 'yaml' | 'json' | 'text'

/**
 * Pick the update strategy for a file from its extension.
 *
 * @param filePath - The path to the file.
 * @returns `yaml` for `.yml`/`.yaml`, `json` for `.json`, `text` otherwise.
 */
export function detectVersionFileKind(filePath: string): VersionFileKind {
  let extension = extname(filePath).toLowerCase()
  if (extension === '.yml' || extension === '.yaml') {
    return 'yaml'
  }
  return extension === '.json' ? 'json' : 'text'
}
