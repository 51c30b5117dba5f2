/**
 * A response body that could not be turned into the expected value.
 * Only ever logged; callers see a generic decoding failure.
 */
export class DecodeError extends Error {
  public readonly cause?: unknown;

  public constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'DecodeError';
    this.cause = cause;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}
