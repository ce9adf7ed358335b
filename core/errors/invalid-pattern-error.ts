/** Raised for glob patterns using syntax other than `*`, `?` and literals. */
export class InvalidPatternError extends Error {
  /** The rejected pattern. */
  public readonly pattern: string

  /**
   * Creates a new InvalidPatternError.
   *
   * @param pattern - The rejected pattern.
   * @param reason - What is wrong with it.
   */
  public constructor(pattern: string, reason: string) {
    super(`Invalid pattern "${pattern}": ${reason}`)
    this.name = 'InvalidPatternError'
    this.pattern = pattern
  }
}
