import { MAX_GIT_OUTPUT_LENGTH } from '../constants'

/** Known Git failure messages and their explanation. */
let KNOWN_FAILURES: [needle: string, description: string][] = [
  ['not a git repository', 'The current directory is not a Git repository.'],
  ['already exists', 'The specified reference already exists.'],
  ['does not exist', 'The specified reference does not exist.'],
  [
    'remote: Repository not found',
    'Repository not found. Check the repository URL.',
  ],
  ['not found', 'The specified reference does not exist.'],
  ['Permission denied', 'Permission denied. Check your credentials.'],
  ['failed to push', 'Failed to push to remote. Try fetching changes first.'],
  [
    'cannot lock ref',
    'Cannot lock reference. Another operation may be in progress.',
  ],
  [
    'empty ident',
    'Git identity not configured. Set user.name and user.email first.',
  ],
  ['bad revision', 'Invalid revision or reference provided.'],
  ['unknown revision', 'Invalid revision or reference provided.'],
  ['Not a valid object name', 'The specified object name is not valid.'],
  ['unknown switch', 'Invalid command option provided.'],
  ['could not read', 'Could not read from the repository. Check permissions.'],
  [
    'unable to access',
    'Unable to access the repository. Check network and credentials.',
  ],
]

/** Raised when a Git command exits with a non-zero code. */
export class GitCommandError extends Error {
  /** Arguments passed to `git`. */
  public readonly args: string[]

  /** Exit code of the process. */
  public readonly exitCode: number

  /** Captured standard error. */
  public readonly stderr: string

  /**
   * Creates a new GitCommandError.
   *
   * @param args - Arguments passed to `git`.
   * @param exitCode - Exit code of the process.
   * @param stderr - Captured standard error.
   */
  public constructor(args: string[], exitCode: number, stderr: string) {
    super(describeFailure(args, exitCode, stderr))
    this.name = 'GitCommandError'
    this.exitCode = exitCode
    this.stderr = stderr
    this.args = args
  }
}

/**
 * Build a readable message for a failed Git command.
 *
 * @param args - Arguments passed to `git`.
 * @param exitCode - Exit code of the process.
 * @param stderr - Captured standard error.
 * @returns Message naming the command, a known cause and the output.
 */
function describeFailure(
  args: string[],
  exitCode: number,
  stderr: string,
): string {
  let message = `Command 'git ${args.join(' ')}' failed with exit code ${exitCode}`

  let known = KNOWN_FAILURES.find(([needle]) => stderr.includes(needle))
  if (known) {
    message += `: ${known[1]}`
  }

  let output = stderr.trim()
  if (output) {
    let truncated =
      output.length > MAX_GIT_OUTPUT_LENGTH
        ? `${output.slice(0, MAX_GIT_OUTPUT_LENGTH)}... (truncated)`
        : output
    message += `\nError output:\n${truncated}`
  }

  return message
}
