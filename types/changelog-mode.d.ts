/** Whether the changelog section describes a pending or published release. */
export type ChangelogMode = 'unreleased' | 'release'
