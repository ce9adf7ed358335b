import type { SemanticVersion } from '../../types/semantic-version'

/**
 * Render a semantic version as `{prefix}{major}.{minor}.{patch}`.
 *
 * @param version - Version to render.
 * @returns Textual form of the version.
 */
export function formatSemanticVersion(version: SemanticVersion): string {
  return `${version.prefix}${version.major}.${version.minor}.${version.patch}`
}
