/**
 * Replace the top-level `version` property of a JSON object.
 *
 * @param content - JSON source.
 * @param version - New version value.
 * @returns Source re-serialized with two-space indentation, or null when the
 *   content is not a JSON object with a `version` property.
 */
export function setJsonVersion(content: string, version: string): string | null {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch {
    return null
  }

  if (
    !data ||
    typeof data !== 'object' ||
    Array.isArray(data) ||
    !Object.hasOwn(data, 'version')
  ) {
    return null
  }

  return `${JSON.stringify({ ...data, version }, null, 2)}\n`
}
