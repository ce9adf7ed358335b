import { setFailed } from '@actions/core'
import pc from 'picocolors'

/**
 * Print a failure and mark the action step as failed.
 *
 * @param error - Caught value.
 */
export function reportFailure(error: unknown): void {
  let message = error instanceof Error ? error.message : String(error)

  console.error(pc.redBright('\nError:'), message)

  if (error instanceof Error && error.name === 'InvalidVersionFormatError') {
    console.error(
      pc.gray(
        '\nCheck --version-prefix and --default-version, e.g. --version-prefix v --default-version v0.1.0\n',
      ),
    )
  }

  if (process.env['GITHUB_ACTIONS'] === 'true') {
    setFailed(message)
  }
}
