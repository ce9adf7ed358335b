import { runGit } from './run-git'

/** Options for creating a tag. */
export interface CreateTagOptions {
  /** Annotation message, creates an annotated tag when set. */
  message?: string

  /** Replace an existing tag with the same name. */
  force?: boolean

  /** Commit, branch or other revision to tag, HEAD when omitted. */
  ref?: string
}

/**
 * Create a local tag.
 *
 * @param name - Tag name, expected to be validated by the caller.
 * @param options - Tag options.
 */
export async function createTag(
  name: string,
  options: CreateTagOptions = {},
): Promise<void> {
  let args = ['tag']

  if (options.force) {
    args.push('--force')
  }

  if (options.message) {
    args.push('--annotate', name, '--message', options.message)
  } else {
    args.push(name)
  }

  if (options.ref) {
    args.push(options.ref)
  }

  await runGit(args)
}
