/**
 * Check whether a name is safe to use as a tag.
 *
 * Rejects empty names, whitespace, control characters, any of
 * `~ ^ : ? * [ ] \`, a leading `-` and `..` sequences.
 *
 * @param name - Proposed tag name.
 * @returns True when the name can be passed to Git.
 */
export function validateTagName(name: string): boolean {
  if (!name || name.startsWith('-') || name.includes('..')) {
    return false
  }

  // eslint-disable-next-line no-control-regex
  return !/[\s\u0000-\u001F\u007F~^:?*[\]\\]/u.test(name)
}
