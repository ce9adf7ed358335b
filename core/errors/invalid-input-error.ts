/** Raised when an argument is outside the accepted range or missing. */
export class InvalidInputError extends Error {
  /**
   * Creates a new InvalidInputError.
   *
   * @param message - Description of the rejected input.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}
