import { GitCommandError } from './git-command-error'
import { runGit } from './run-git'

/** Identity used for annotated tags when the runner has none. */
let BOT_NAME = 'github-actions[bot]'
let BOT_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com'

/**
 * Make the workspace usable by Git inside a CI container.
 *
 * Marks the workspace as a safe directory and configures a bot identity when
 * no `user.name` is set.
 *
 * @param workspace - Path of the checked out repository.
 */
export async function prepareGitEnvironment(workspace: string): Promise<void> {
  await runGit(['config', '--global', '--add', 'safe.directory', workspace])

  if (await hasConfigValue('user.name')) {
    return
  }

  await runGit(['config', '--global', 'user.name', BOT_NAME])
  await runGit(['config', '--global', 'user.email', BOT_EMAIL])
}

/**
 * Check whether a Git config key is set.
 *
 * @param key - Config key.
 * @returns True when `git config --get` finds a value.
 */
async function hasConfigValue(key: string): Promise<boolean> {
  try {
    let value = await runGit(['config', '--get', key])
    return value.trim() !== ''
  } catch (error) {
    /** `git config --get` exits with 1 when the key is missing. */
    if (error instanceof GitCommandError && error.exitCode === 1) {
      return false
    }
    throw error
  }
}
