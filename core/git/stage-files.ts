import { runGit } from './run-git'

/**
 * Add files to the index, or every change when no file is given.
 *
 * @param files - Paths to stage.
 */
export async function stageFiles(files: string[]): Promise<void> {
  await runGit(files.length > 0 ? ['add', '--', ...files] : ['add', '--all'])
}
