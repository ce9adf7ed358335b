/** Version reported when no tag matches the tag pattern. */
export const DEFAULT_VERSION = 'v0.1.0'

/** Prefix stripped from tags before parsing. */
export const DEFAULT_VERSION_PREFIX = 'v'

/** Glob used to select version tags. */
export const DEFAULT_TAG_PATTERN = 'v*'

/** Changelog file rewritten by the changelog command. */
export const DEFAULT_CHANGELOG_FILE = 'CHANGELOG.md'

/** Remote that tags are pushed to and deleted from. */
export const DEFAULT_REMOTE = 'origin'

/** Maximum length of Git stderr kept in error messages. */
export const MAX_GIT_OUTPUT_LENGTH = 500

/** Branch checked out before deleting the current branch. */
export const DEFAULT_BASE_BRANCH = 'main'

/** Number of commits listed when no limit is given. */
export const DEFAULT_COMMIT_LIMIT = 10
