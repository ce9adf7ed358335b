/** Raised when a string is not a `{prefix}{major}.{minor}.{patch}` version. */
export class InvalidVersionFormatError extends Error {
  /** The rejected value. */
  public readonly value: string

  /**
   * Creates a new InvalidVersionFormatError.
   *
   * @param value - The rejected value.
   * @param prefix - Prefix the value was expected to carry.
   */
  public constructor(value: string, prefix: string) {
    super(
      `Invalid version format: "${value}". Expected ${prefix}MAJOR.MINOR.PATCH`,
    )
    this.name = 'InvalidVersionFormatError'
    this.value = value
  }
}
