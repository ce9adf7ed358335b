import { beforeEach, describe, expect, it, vi } from 'vitest'
import { getExecOutput } from '@actions/exec'

import { GitCommandError } from '../../core/git/git-command-error'
import { runGit } from '../../core/git/run-git'

vi.mock(import('@actions/exec'), () => ({
  getExecOutput: vi.fn(),
}))

describe('runGit', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('returns stdout of a successful command', async () => {
    vi.mocked(getExecOutput).mockResolvedValue({
      stdout: 'v1.0.0\n',
      exitCode: 0,
      stderr: '',
    })

    await expect(runGit(['tag', '--list'])).resolves.toBe('v1.0.0\n')
    expect(getExecOutput).toHaveBeenCalledWith('git', ['tag', '--list'], {
      ignoreReturnCode: true,
      silent: true,
    })
  })

  it('throws GitCommandError on non-zero exit', async () => {
    vi.mocked(getExecOutput).mockResolvedValue({
      stderr: 'fatal: not a git repository (or any of the parent directories)',
      exitCode: 128,
      stdout: '',
    })

    let error = await runGit(['rev-parse', 'HEAD']).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(GitCommandError)
    expect(error).toMatchObject({
      args: ['rev-parse', 'HEAD'],
      name: 'GitCommandError',
      exitCode: 128,
    })
  })
})
