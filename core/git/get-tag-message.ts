import { runGit } from './run-git'

/**
 * Read the annotation message of a tag.
 *
 * @param name - Tag name.
 * @returns Message of an annotated tag, empty for lightweight tags.
 */
export async function getTagMessage(name: string): Promise<string> {
  let output = await runGit([
    'for-each-ref',
    '--format=%(objecttype)%00%(contents)',
    `refs/tags/${name}`,
  ])
  let separator = output.indexOf('\0')
  if (separator === -1 || output.slice(0, separator) !== 'tag') {
    return ''
  }
  return output.slice(separator + 1).trim()
}
