import { getExecOutput } from '@actions/exec'

import { GitCommandError } from './git-command-error'

/**
 * Run `git` in the current directory and return its standard output.
 *
 * @param args - Arguments passed to `git`.
 * @returns Standard output of the command.
 * @throws {GitCommandError} When the command exits with a non-zero code.
 */
export async function runGit(args: string[]): Promise<string> {
  let { exitCode, stdout, stderr } = await getExecOutput('git', args, {
    ignoreReturnCode: true,
    silent: true,
  })

  if (exitCode !== 0) {
    throw new GitCommandError(args, exitCode, stderr)
  }

  return stdout
}
