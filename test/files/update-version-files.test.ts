import { writeFile, readFile, mkdtemp, rm } from 'node:fs/promises'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { updateVersionFiles } from '../../core/files/update-version-files'

describe('updateVersionFiles', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'version-files-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('updates each supported file type without the prefix', async () => {
    let yaml = join(directory, 'Chart.yaml')
    let json = join(directory, 'package.json')
    let text = join(directory, 'setup.cfg')
    await writeFile(yaml, 'name: app\nversion: 1.0.0\n')
    await writeFile(json, '{"name":"app","version":"1.0.0"}\n')
    await writeFile(text, 'version = 1.0.0\n')

    let results = await updateVersionFiles([yaml, json, text], 'v1.1.0')

    expect(results).toEqual([
      { updated: true, file: yaml },
      { updated: true, file: json },
      { updated: true, file: text },
    ])
    await expect(readFile(yaml, 'utf8')).resolves.toBe(
      'name: app\nversion: 1.1.0\n',
    )
    await expect(readFile(json, 'utf8')).resolves.toBe(
      '{\n  "name": "app",\n  "version": "1.1.0"\n}\n',
    )
    await expect(readFile(text, 'utf8')).resolves.toBe('version = 1.1.0\n')
  })

  it('keeps the prefix when asked', async () => {
    let text = join(directory, 'VERSION.txt')
    await writeFile(text, 'version: 1.0.0\n')

    await updateVersionFiles([text], 'v2.0.0', { stripPrefix: false })

    await expect(readFile(text, 'utf8')).resolves.toBe('version: v2.0.0\n')
  })

  it('reports missing files and files without a version', async () => {
    let missing = join(directory, 'missing.json')
    let plain = join(directory, 'README.md')
    await writeFile(plain, '# App\n')

    let results = await updateVersionFiles([missing, plain], '1.0.0')

    expect(results).toEqual([
      { reason: 'File not found', updated: false, file: missing },
      { reason: 'No version field found', updated: false, file: plain },
    ])
    await expect(readFile(plain, 'utf8')).resolves.toBe('# App\n')
  })

  it('rejects malformed versions', async () => {
    await expect(
      updateVersionFiles([join(directory, 'a.json')], '1.0'),
    ).rejects.toThrowError(
      'Invalid version format: "1.0". Expected [v]MAJOR.MINOR.PATCH',
    )
  })

  it('rejects an empty file list', async () => {
    await expect(updateVersionFiles([], '1.0.0')).rejects.toThrowError(
      'No files specified to update',
    )
  })
})
