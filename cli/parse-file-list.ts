/**
 * Split a multi-line `files` input into paths.
 *
 * One path per line; blank lines are dropped and surrounding quotes removed.
 *
 * @param raw - Input value.
 * @returns File paths.
 */
export function parseFileList(raw: undefined | string): string[] {
  if (!raw) {
    return []
  }

  return raw
    .split(/\r?\n/u)
    .map(line => line.trim().replaceAll(/^["']+|["']+$/gu, ''))
    .filter(Boolean)
}
