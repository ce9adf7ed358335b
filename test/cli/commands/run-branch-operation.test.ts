import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { BranchOperationOptions } from '../../../cli/commands/run-branch-operation'

import { runBranchOperation } from '../../../cli/commands/run-branch-operation'
import { getCurrentBranch } from '../../../core/git/get-current-branch'
import { checkoutBranch } from '../../../core/git/checkout-branch'
import { branchExists } from '../../../core/git/branch-exists'
import { createBranch } from '../../../core/git/create-branch'
import { deleteBranch } from '../../../core/git/delete-branch'
import { listBranches } from '../../../core/git/list-branches'
import { pushBranch } from '../../../core/git/push-branch'

vi.mock(import('../../../core/git/get-current-branch'), () => ({
  getCurrentBranch: vi.fn(),
}))

vi.mock(import('../../../core/git/checkout-branch'), () => ({
  checkoutBranch: vi.fn(),
}))

vi.mock(import('../../../core/git/branch-exists'), () => ({
  branchExists: vi.fn(),
}))

vi.mock(import('../../../core/git/create-branch'), () => ({
  createBranch: vi.fn(),
}))

vi.mock(import('../../../core/git/delete-branch'), () => ({
  deleteBranch: vi.fn(),
}))

vi.mock(import('../../../core/git/list-branches'), () => ({
  listBranches: vi.fn(),
}))

vi.mock(import('../../../core/git/push-branch'), () => ({
  pushBranch: vi.fn(),
}))

/**
 * Build operation options with test defaults.
 *
 * @param overrides - Fields to replace.
 * @returns Operation options.
 */
function options(
  overrides: Partial<BranchOperationOptions> = {},
): BranchOperationOptions {
  return {
    name: 'feature/login',
    remote: false,
    force: false,
    ...overrides,
  }
}

describe('runBranchOperation', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(getCurrentBranch).mockResolvedValue('main')
    vi.mocked(branchExists).mockResolvedValue(false)
  })

  it('lists branches matching a pattern in alphabetic order', async () => {
    vi.mocked(listBranches).mockResolvedValue([
      'main',
      'feature/signup',
      'feature/login',
      'release/v1.0.0',
    ])

    await expect(
      runBranchOperation('list', options({ pattern: 'feature/*' })),
    ).resolves.toEqual({
      branches: ['feature/login', 'feature/signup'],
      currentBranch: 'main',
      succeeded: true,
    })
    expect(listBranches).toHaveBeenCalledWith({ includeRemote: false })
  })

  it('lists every branch without a pattern', async () => {
    vi.mocked(listBranches).mockResolvedValue(['main', 'develop'])

    await expect(
      runBranchOperation('list', options({ name: undefined, remote: true })),
    ).resolves.toEqual({
      branches: ['develop', 'main'],
      currentBranch: 'main',
      succeeded: true,
    })
    expect(listBranches).toHaveBeenCalledWith({ includeRemote: true })
  })

  it('creates a branch from a base and pushes it', async () => {
    vi.mocked(getCurrentBranch).mockResolvedValue('feature/login')

    await expect(
      runBranchOperation('create', options({ base: 'develop', remote: true })),
    ).resolves.toEqual({ currentBranch: 'feature/login', succeeded: true })
    expect(createBranch).toHaveBeenCalledWith('feature/login', {
      base: 'develop',
    })
    expect(pushBranch).toHaveBeenCalledWith('feature/login')
  })

  it('reports an existing branch on create', async () => {
    vi.mocked(branchExists).mockResolvedValue(true)

    await expect(runBranchOperation('create', options())).resolves.toEqual({
      reason: 'Branch feature/login already exists.',
      currentBranch: 'main',
      succeeded: false,
    })
    expect(createBranch).not.toHaveBeenCalled()
  })

  it('deletes a local branch', async () => {
    vi.mocked(branchExists).mockResolvedValue(true)

    await expect(
      runBranchOperation('delete', options({ force: true })),
    ).resolves.toEqual({ currentBranch: 'main', succeeded: true })
    expect(checkoutBranch).not.toHaveBeenCalled()
    expect(deleteBranch).toHaveBeenCalledWith('feature/login', {
      remote: false,
      force: true,
      local: true,
    })
  })

  it('leaves the current branch before deleting it', async () => {
    vi.mocked(getCurrentBranch)
      .mockResolvedValueOnce('feature/login')
      .mockResolvedValue('develop')
    vi.mocked(branchExists).mockResolvedValue(true)

    await expect(
      runBranchOperation('delete', options({ base: 'develop' })),
    ).resolves.toEqual({ currentBranch: 'develop', succeeded: true })
    expect(checkoutBranch).toHaveBeenCalledWith('develop')
  })

  it('falls back to main when leaving the current branch', async () => {
    vi.mocked(getCurrentBranch).mockResolvedValue('feature/login')
    vi.mocked(branchExists).mockResolvedValue(true)

    await runBranchOperation('delete', options())

    expect(checkoutBranch).toHaveBeenCalledWith('main')
  })

  it('deletes only the remote branch when there is no local one', async () => {
    await runBranchOperation('delete', options({ remote: true }))

    expect(deleteBranch).toHaveBeenCalledWith('feature/login', {
      remote: true,
      force: false,
      local: false,
    })
  })

  it('skips deleting a branch that exists nowhere', async () => {
    await expect(runBranchOperation('delete', options())).resolves.toEqual({
      currentBranch: 'main',
      succeeded: true,
    })
    expect(deleteBranch).not.toHaveBeenCalled()
  })

  it('checks out a branch', async () => {
    vi.mocked(getCurrentBranch).mockResolvedValue('feature/login')

    await expect(
      runBranchOperation('checkout', options({ force: true })),
    ).resolves.toEqual({ currentBranch: 'feature/login', succeeded: true })
    expect(checkoutBranch).toHaveBeenCalledWith('feature/login', {
      force: true,
    })
  })

  it('pushes a branch', async () => {
    await runBranchOperation('push', options())

    expect(pushBranch).toHaveBeenCalledWith('feature/login', { force: false })
  })

  it('requires a branch name', async () => {
    await expect(
      runBranchOperation('checkout', options({ name: undefined })),
    ).rejects.toThrow('Branch name is required for checkout')
  })

  it('rejects an invalid branch name', async () => {
    await expect(
      runBranchOperation('create', options({ name: 'feature..login' })),
    ).rejects.toThrow('Invalid branch name: feature..login')
    expect(createBranch).not.toHaveBeenCalled()
  })
})
