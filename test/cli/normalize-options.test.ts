import { describe, expect, it } from 'vitest'

import { normalizeBranchOperation } from '../../cli/normalize-branch-operation'
import { normalizeCommitOperation } from '../../cli/normalize-commit-operation'
import { normalizeChangelogMode } from '../../cli/normalize-changelog-mode'
import { normalizeTagOperation } from '../../cli/normalize-tag-operation'
import { normalizeSortMode } from '../../cli/normalize-sort-mode'

describe('normalizeSortMode', () => {
  it('defaults to alphabetic', () => {
    expect(normalizeSortMode(undefined)).toBe('alphabetic')
  })

  it('accepts modes in any case', () => {
    expect(normalizeSortMode('Version')).toBe('version')
    expect(normalizeSortMode('DATE')).toBe('date')
  })

  it('rejects unknown modes', () => {
    expect(() => normalizeSortMode('size')).toThrowError(
      'Invalid sort "size". Expected "alphabetic", "version", or "date".',
    )
  })
})

describe('normalizeTagOperation', () => {
  it('accepts every operation', () => {
    expect(
      ['create', 'delete', 'push', 'check', 'list'].map(normalizeTagOperation),
    ).toEqual(['create', 'delete', 'push', 'check', 'list'])
  })

  it('lower-cases the operation', () => {
    expect(normalizeTagOperation('Create')).toBe('create')
  })

  it('rejects missing and unknown operations', () => {
    expect(() => normalizeTagOperation(undefined)).toThrowError(
      'Invalid operation "undefined"',
    )
    expect(() => normalizeTagOperation('rename')).toThrowError(
      'Invalid operation "rename". Expected "create", "delete", "push", "check", or "list".',
    )
  })
})

describe('normalizeChangelogMode', () => {
  it('defaults to unreleased', () => {
    expect(normalizeChangelogMode(undefined)).toBe('unreleased')
  })

  it('accepts release', () => {
    expect(normalizeChangelogMode('RELEASE')).toBe('release')
  })

  it('rejects unknown modes', () => {
    expect(() => normalizeChangelogMode('draft')).toThrowError(
      'Invalid mode "draft". Expected "unreleased" or "release".',
    )
  })
})

describe('normalizeBranchOperation', () => {
  it('accepts every operation in any case', () => {
    expect(
      ['Create', 'delete', 'CHECKOUT', 'push', 'list'].map(
        normalizeBranchOperation,
      ),
    ).toEqual(['create', 'delete', 'checkout', 'push', 'list'])
  })

  it('rejects merge', () => {
    expect(() => normalizeBranchOperation('merge')).toThrowError(
      'Invalid operation "merge". Expected "create", "delete", "checkout", "push", or "list".',
    )
  })
})

describe('normalizeCommitOperation', () => {
  it('accepts every operation in any case', () => {
    expect(['create', 'Amend', 'LIST'].map(normalizeCommitOperation)).toEqual([
      'create',
      'amend',
      'list',
    ])
  })

  it('rejects a missing operation', () => {
    expect(() => normalizeCommitOperation(undefined)).toThrowError(
      'Invalid operation "undefined". Expected "create", "amend", or "list".',
    )
  })
})
