import type { BranchOperationResult } from '../../types/branch-operation-result'
import type { BranchOperation } from '../../types/branch-operation'

import { validateBranchName } from '../../core/branches/validate-branch-name'
import { InvalidInputError } from '../../core/errors/invalid-input-error'
import { compileGlobPattern } from '../../core/tags/compile-glob-pattern'
import { getCurrentBranch } from '../../core/git/get-current-branch'
import { checkoutBranch } from '../../core/git/checkout-branch'
import { branchExists } from '../../core/git/branch-exists'
import { createBranch } from '../../core/git/create-branch'
import { deleteBranch } from '../../core/git/delete-branch'
import { listBranches } from '../../core/git/list-branches'
import { DEFAULT_BASE_BRANCH } from '../../core/constants'
import { pushBranch } from '../../core/git/push-branch'

/** Settings of a branch operation. */
export interface BranchOperationOptions {
  /**
   * Start point for `create`, and the branch checked out before deleting the
   * current one.
   */
  base?: string

  /** Glob filtering `list`. */
  pattern?: string

  /** Push after `create`, delete remotely, list remote branches. */
  remote: boolean

  /** Force `delete`, `checkout` and `push`. */
  force: boolean

  /** Branch name, required for every operation except `list`. */
  name?: string
}

/**
 * Create, delete, check out, push or list branches.
 *
 * Creating a branch that already exists is reported as a failure rather than
 * thrown, so outputs can still be written.
 *
 * @param operation - Operation to perform.
 * @param options - Operation settings.
 * @returns Outcome of the operation.
 */
export async function runBranchOperation(
  operation: BranchOperation,
  options: BranchOperationOptions,
): Promise<BranchOperationResult> {
  if (operation === 'list') {
    let regex = options.pattern ? compileGlobPattern(options.pattern) : null
    let branches = await listBranches({ includeRemote: options.remote })
    return {
      branches: branches.filter(branch => !regex || regex.test(branch)).sort(),
      currentBranch: await getCurrentBranch(),
      succeeded: true,
    }
  }

  let name = requireBranchName(operation, options.name)

  switch (operation) {
    case 'create': {
      if (await branchExists(name)) {
        return {
          reason: `Branch ${name} already exists.`,
          currentBranch: await getCurrentBranch(),
          succeeded: false,
        }
      }

      await createBranch(name, { base: options.base })
      if (options.remote) {
        await pushBranch(name)
      }
      break
    }

    case 'delete': {
      if ((await getCurrentBranch()) === name) {
        await checkoutBranch(options.base ?? DEFAULT_BASE_BRANCH)
      }

      let exists = await branchExists(name)
      if (exists || options.remote) {
        await deleteBranch(name, {
          remote: options.remote,
          force: options.force,
          local: exists,
        })
      }
      break
    }

    case 'checkout': {
      await checkoutBranch(name, { force: options.force })
      break
    }

    case 'push': {
      await pushBranch(name, { force: options.force })
      break
    }
  }

  return { currentBranch: await getCurrentBranch(), succeeded: true }
}

/**
 * Ensure a usable branch name was given.
 *
 * @param operation - Operation that needs the name.
 * @param name - Provided name.
 * @returns The validated name.
 */
function requireBranchName(
  operation: BranchOperation,
  name: undefined | string,
): string {
  if (!name) {
    throw new InvalidInputError(`Branch name is required for ${operation}`)
  }
  if (!validateBranchName(name)) {
    throw new InvalidInputError(`Invalid branch name: ${name}`)
  }
  return name
}
