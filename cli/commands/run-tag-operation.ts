import type { TagOperationResult } from '../../types/tag-operation-result'
import type { TagListConfig } from '../../types/tag-list-config'
import type { TagOperation } from '../../types/tag-operation'

import { InvalidInputError } from '../../core/errors/invalid-input-error'
import { validateTagName } from '../../core/tags/validate-tag-name'
import { getTagMessage } from '../../core/git/get-tag-message'
import { createTag } from '../../core/git/create-tag'
import { deleteTag } from '../../core/git/delete-tag'
import { tagExists } from '../../core/git/tag-exists'
import { pushTag } from '../../core/git/push-tag'
import { listTags } from './list-tags'

/** Settings of a tag operation. */
export interface TagOperationOptions {
  /** Listing settings, used by `list`. */
  list: TagListConfig

  /** Annotation message for `create`. */
  message?: string

  /** Push after `create`, delete on the remote for `delete`. */
  remote: boolean

  /** Overwrite existing tags on `create` and `push`. */
  force: boolean

  /** Revision to tag on `create`. */
  ref?: string

  /** Tag name, required for every operation except `list`. */
  name?: string
}

/**
 * Create, delete, push, check or list tags.
 *
 * Creating an existing tag without `force` is reported as a failure rather
 * than thrown, so outputs can still be written.
 *
 * @param operation - Operation to perform.
 * @param options - Operation settings.
 * @returns Outcome of the operation.
 */
export async function runTagOperation(
  operation: TagOperation,
  options: TagOperationOptions,
): Promise<TagOperationResult> {
  if (operation === 'list') {
    let tags = await listTags(options.list)
    return { tagExists: false, succeeded: true, tagMessage: '', tags }
  }

  let name = requireTagName(operation, options.name)
  let exists = await tagExists(name)

  switch (operation) {
    case 'create': {
      if (exists && !options.force) {
        return {
          reason: `Tag ${name} already exists. Use --force to overwrite.`,
          succeeded: false,
          tagExists: true,
          tagMessage: '',
        }
      }

      await createTag(name, {
        message: options.message,
        force: options.force,
        ref: options.ref,
      })

      if (options.remote) {
        await pushTag(name, { force: options.force })
      }

      return { tagExists: exists, succeeded: true, tagMessage: '' }
    }

    case 'delete': {
      if (exists || options.remote) {
        await deleteTag(name, { remote: options.remote, local: exists })
      }
      return { tagExists: exists, succeeded: true, tagMessage: '' }
    }

    case 'push': {
      await pushTag(name, { force: options.force })
      return { tagExists: exists, succeeded: true, tagMessage: '' }
    }

    case 'check': {
      let tagMessage = exists ? await getTagMessage(name) : ''
      return { tagExists: exists, succeeded: true, tagMessage }
    }
  }
}

/**
 * Ensure a usable tag name was given.
 *
 * @param operation - Operation that needs the name.
 * @param name - Provided name.
 * @returns The validated name.
 */
function requireTagName(
  operation: TagOperation,
  name: undefined | string,
): string {
  if (!name) {
    throw new InvalidInputError(`Tag name is required for ${operation}`)
  }
  if (!validateTagName(name)) {
    throw new InvalidInputError(`Invalid tag name: ${name}`)
  }
  return name
}
