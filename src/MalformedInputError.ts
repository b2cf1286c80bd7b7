/**
 * Raised when raw puzzle input cannot describe a valid initial state.
 *
 * Thrown while a puzzle or a puzzle spec file is being built, so the search core
 * never receives an inconsistent state.
 */
export class MalformedInputError extends Error {
  public override readonly name = 'MalformedInputError';

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
