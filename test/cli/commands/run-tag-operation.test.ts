import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { TagOperationOptions } from '../../../cli/commands/run-tag-operation'

import { runTagOperation } from '../../../cli/commands/run-tag-operation'
import { getTagMessage } from '../../../core/git/get-tag-message'
import { listTags } from '../../../cli/commands/list-tags'
import { createTag } from '../../../core/git/create-tag'
import { deleteTag } from '../../../core/git/delete-tag'
import { tagExists } from '../../../core/git/tag-exists'
import { pushTag } from '../../../core/git/push-tag'

vi.mock(import('../../../core/git/get-tag-message'), () => ({
  getTagMessage: vi.fn(),
}))

vi.mock(import('../../../core/git/create-tag'), () => ({
  createTag: vi.fn(),
}))

vi.mock(import('../../../core/git/delete-tag'), () => ({
  deleteTag: vi.fn(),
}))

vi.mock(import('../../../core/git/tag-exists'), () => ({
  tagExists: vi.fn(),
}))

vi.mock(import('../../../core/git/push-tag'), () => ({
  pushTag: vi.fn(),
}))

vi.mock(import('../../../cli/commands/list-tags'), () => ({
  listTags: vi.fn(),
}))

/**
 * Build operation options with test defaults.
 *
 * @param overrides - Fields to replace.
 * @returns Operation options.
 */
function options(
  overrides: Partial<TagOperationOptions> = {},
): TagOperationOptions {
  return {
    list: { sort: 'alphabetic', versionPrefix: 'v' },
    name: 'v1.0.0',
    remote: false,
    force: false,
    ...overrides,
  }
}

describe('runTagOperation', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(tagExists).mockResolvedValue(false)
  })

  it('lists tags', async () => {
    vi.mocked(listTags).mockResolvedValue(['v1.0.0', 'v1.1.0'])

    await expect(runTagOperation('list', options())).resolves.toEqual({
      tags: ['v1.0.0', 'v1.1.0'],
      tagExists: false,
      succeeded: true,
      tagMessage: '',
    })
    expect(tagExists).not.toHaveBeenCalled()
  })

  it('creates and pushes a new tag', async () => {
    await expect(
      runTagOperation(
        'create',
        options({ message: 'Release', remote: true, ref: 'main' }),
      ),
    ).resolves.toEqual({ tagExists: false, succeeded: true, tagMessage: '' })
    expect(createTag).toHaveBeenCalledWith('v1.0.0', {
      message: 'Release',
      force: false,
      ref: 'main',
    })
    expect(pushTag).toHaveBeenCalledWith('v1.0.0', { force: false })
  })

  it('refuses to overwrite an existing tag without force', async () => {
    vi.mocked(tagExists).mockResolvedValue(true)

    await expect(runTagOperation('create', options())).resolves.toEqual({
      reason: 'Tag v1.0.0 already exists. Use --force to overwrite.',
      succeeded: false,
      tagExists: true,
      tagMessage: '',
    })
    expect(createTag).not.toHaveBeenCalled()
  })

  it('overwrites an existing tag with force', async () => {
    vi.mocked(tagExists).mockResolvedValue(true)

    await expect(
      runTagOperation('create', options({ force: true })),
    ).resolves.toEqual({ tagExists: true, succeeded: true, tagMessage: '' })
    expect(createTag).toHaveBeenCalledWith('v1.0.0', {
      message: undefined,
      ref: undefined,
      force: true,
    })
    expect(pushTag).not.toHaveBeenCalled()
  })

  it('deletes an existing tag locally', async () => {
    vi.mocked(tagExists).mockResolvedValue(true)

    await runTagOperation('delete', options())

    expect(deleteTag).toHaveBeenCalledWith('v1.0.0', {
      remote: false,
      local: true,
    })
  })

  it('does nothing when deleting a missing local tag', async () => {
    await expect(runTagOperation('delete', options())).resolves.toEqual({
      tagExists: false,
      succeeded: true,
      tagMessage: '',
    })
    expect(deleteTag).not.toHaveBeenCalled()
  })

  it('deletes a remote tag that is missing locally', async () => {
    await runTagOperation('delete', options({ remote: true }))

    expect(deleteTag).toHaveBeenCalledWith('v1.0.0', {
      remote: true,
      local: false,
    })
  })

  it('pushes a tag', async () => {
    vi.mocked(tagExists).mockResolvedValue(true)

    await runTagOperation('push', options({ force: true }))

    expect(pushTag).toHaveBeenCalledWith('v1.0.0', { force: true })
  })

  it('reports the message of an existing tag', async () => {
    vi.mocked(tagExists).mockResolvedValue(true)
    vi.mocked(getTagMessage).mockResolvedValue('Release 1.0.0')

    await expect(runTagOperation('check', options())).resolves.toEqual({
      tagMessage: 'Release 1.0.0',
      tagExists: true,
      succeeded: true,
    })
  })

  it('reports a missing tag', async () => {
    await expect(runTagOperation('check', options())).resolves.toEqual({
      tagExists: false,
      succeeded: true,
      tagMessage: '',
    })
    expect(getTagMessage).not.toHaveBeenCalled()
  })

  it('requires a tag name', async () => {
    await expect(
      runTagOperation('check', options({ name: undefined })),
    ).rejects.toThrowError('Tag name is required for check')
  })

  it('rejects invalid tag names', async () => {
    await expect(
      runTagOperation('create', options({ name: 'bad name' })),
    ).rejects.toThrowError('Invalid tag name: bad name')
    expect(tagExists).not.toHaveBeenCalled()
  })
})
