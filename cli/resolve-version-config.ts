import type { VersionConfig } from '../types/version-config'

import {
  DEFAULT_VERSION_PREFIX,
  DEFAULT_TAG_PATTERN,
  DEFAULT_VERSION,
} from '../core/constants'
import { pickOption } from './pick-option'
import { pickFlag } from './pick-flag'

/** Version-related CLI flags as parsed by cac. */
export interface VersionFlags {
  ignoreReleaseBranch?: unknown
  defaultVersion?: unknown
  versionPrefix?: unknown
  tagPattern?: unknown
}

/**
 * Resolve version settings from flags, action inputs and defaults.
 *
 * @param flags - Parsed CLI flags.
 * @returns Resolved configuration.
 */
export function resolveVersionConfig(flags: VersionFlags): VersionConfig {
  return {
    ignoreReleaseBranch: pickFlag(
      flags.ignoreReleaseBranch,
      'ignore_release_branch',
    ),
    defaultVersion:
      pickOption(flags.defaultVersion, 'default_version') ?? DEFAULT_VERSION,
    versionPrefix:
      pickOption(flags.versionPrefix, 'version_prefix', { keepEmpty: true }) ??
      DEFAULT_VERSION_PREFIX,
    tagPattern:
      pickOption(flags.tagPattern, 'tag_pattern') ?? DEFAULT_TAG_PATTERN,
  }
}
