import { validateTagName } from '../tags/validate-tag-name'

/**
 * Check whether a name is safe to use as a branch.
 *
 * Applies the tag name rules and also rejects names ending in `.lock`,
 * names starting or ending with `/`, and empty path components.
 *
 * @param name - Proposed branch name.
 * @returns True when the name can be passed to Git.
 */
export function validateBranchName(name: string): boolean {
  if (!validateTagName(name)) {
    return false
  }

  return (
    !name.endsWith('.lock') &&
    !name.startsWith('/') &&
    !name.endsWith('/') &&
    !name.includes('//')
  )
}
