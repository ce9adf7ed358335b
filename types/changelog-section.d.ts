import type { ChangelogMode } from './changelog-mode'

/** Section written into the changelog. */
export interface ChangelogSection {
  /** `owner/name` of the repository, required for release links. */
  repository?: string

  /** Whether the section is still pending or already released. */
  mode: ChangelogMode

  /** Release version shown in the heading. */
  version: string

  /** Markdown body of the section. */
  notes: string

  /** Date shown in the heading. */
  date: Date
}
