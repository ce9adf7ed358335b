import type { CommitOperationResult } from '../../types/commit-operation-result'
import type { ListCommitsOptions } from '../../core/git/list-commits'
import type { CommitOperation } from '../../types/commit-operation'

import { hasStagedChanges } from '../../core/git/has-staged-changes'
import { InvalidInputError } from '../../core/errors/invalid-input-error'
import { getHeadCommit } from '../../core/git/get-head-commit'
import { createCommit } from '../../core/git/create-commit'
import { amendCommit } from '../../core/git/amend-commit'
import { listCommits } from '../../core/git/list-commits'
import { stageFiles } from '../../core/git/stage-files'

/** Settings of a commit operation. */
export interface CommitOperationOptions {
  /** Filters for `list`. */
  list: ListCommitsOptions

  /** Record `create` even when nothing is staged. */
  allowEmpty: boolean

  /** Skip commit hooks. */
  noVerify: boolean

  /** Message, required for `create`, optional for `amend`. */
  message?: string

  /** Paths staged before committing. */
  files: string[]
}

/**
 * Create, amend or list commits.
 *
 * `create` stages the given files; without files it commits what is staged,
 * or every change when nothing is. Having nothing to commit is reported as a
 * failure rather than thrown.
 *
 * @param operation - Operation to perform.
 * @param options - Operation settings.
 * @returns Outcome of the operation.
 */
export async function runCommitOperation(
  operation: CommitOperation,
  options: CommitOperationOptions,
): Promise<CommitOperationResult> {
  switch (operation) {
    case 'list':
      return { commits: await listCommits(options.list), succeeded: true }

    case 'create': {
      if (!options.message) {
        throw new InvalidInputError('Commit message is required for create')
      }

      if (options.files.length > 0 || !(await hasStagedChanges())) {
        await stageFiles(options.files)
      }

      if (!options.allowEmpty && !(await hasStagedChanges())) {
        return { reason: 'Nothing to commit.', succeeded: false }
      }

      await createCommit(options.message, {
        allowEmpty: options.allowEmpty,
        noVerify: options.noVerify,
      })
      return { commitHash: await getHeadCommit(), succeeded: true }
    }

    case 'amend': {
      if (options.files.length > 0) {
        await stageFiles(options.files)
      }

      await amendCommit({
        noVerify: options.noVerify,
        message: options.message,
      })
      return { commitHash: await getHeadCommit(), succeeded: true }
    }
  }
}
