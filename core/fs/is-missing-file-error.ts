/**
 * Check for the error Node raises when a path does not exist.
 *
 * @param error - Caught value.
 * @returns True for ENOENT errors.
 */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
