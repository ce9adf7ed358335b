/**
 * Rewrite every `version = 1.2.3` / `version: "v1.2.3"` assignment.
 *
 * The key match is case-insensitive; surrounding quotes are kept.
 *
 * @param content - File content.
 * @param version - New version value.
 * @returns Updated content and the number of replaced occurrences.
 */
export function setTextVersion(
  content: string,
  version: string,
): { content: string; count: number } {
  let count = 0
  let updated = content.replaceAll(
    /(?<key>version\s*[:=]\s*["']?)v?\d+\.\d+\.\d+(?<quote>["']?)/giu,
    (_match, key: string, quote: string) => {
      count += 1
      return `${key}${version}${quote}`
    },
  )
  return { content: updated, count }
}
