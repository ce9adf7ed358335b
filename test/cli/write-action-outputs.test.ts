import type { MockInstance } from 'vitest'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { setOutput } from '@actions/core'
import pc from 'picocolors'

import { writeActionOutputs } from '../../cli/write-action-outputs'

vi.mock(import('@actions/core'), () => ({
  setOutput: vi.fn(),
}))

describe('writeActionOutputs', () => {
  let consoleInfoSpy: MockInstance

  beforeEach(() => {
    vi.clearAllMocks()
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    consoleInfoSpy.mockRestore()
  })

  it('sets outputs inside GitHub Actions', () => {
    vi.stubEnv('GITHUB_OUTPUT', '/tmp/github-output')

    writeActionOutputs({ next_version: 'v1.0.19', commit_count: '3' })

    expect(setOutput).toHaveBeenCalledWith('next_version', 'v1.0.19')
    expect(setOutput).toHaveBeenCalledWith('commit_count', '3')
    expect(consoleInfoSpy).not.toHaveBeenCalled()
  })

  it('prints outputs elsewhere', () => {
    vi.stubEnv('GITHUB_OUTPUT', '')

    writeActionOutputs({ next_version: 'v1.0.19' })

    expect(setOutput).not.toHaveBeenCalled()
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      `${pc.gray('next_version')}=v1.0.19`,
    )
  })
})
