import { InvalidPatternError } from '../errors/invalid-pattern-error'

/**
 * Compile a glob pattern into an anchored regular expression.
 *
 * Supported syntax:
 *
 * - `*` matches any run of characters, `/` included.
 * - `?` matches exactly one character.
 * - Everything else is literal, except `[`, `]` and `\` which are rejected.
 *
 * @param pattern - Glob pattern such as `v*` or `feature/*`.
 * @returns Regular expression matching whole names.
 * @throws {InvalidPatternError} For empty patterns or unsupported syntax.
 */
export function compileGlobPattern(pattern: string): RegExp {
  if (pattern === '') {
    throw new InvalidPatternError(pattern, 'pattern must not be empty')
  }

  let source = ''
  for (let character of pattern) {
    if (character === '*') {
      source += '.*'
    } else if (character === '?') {
      source += '.'
    } else if (character === '[' || character === ']' || character === '\\') {
      throw new InvalidPatternError(
        pattern,
        `unsupported character "${character}", only "*" and "?" wildcards are allowed`,
      )
    } else {
      source += character.replaceAll(/[$()+.^{|}]/gu, String.raw`\$&`)
    }
  }

  return new RegExp(`^${source}$`, 'su')
}
