/**
 * Raised when the caller hands the analyzer something that is not a list of
 * deal objects. Data-quality problems inside a deal never raise.
 */
export class DealInputError extends Error {
  constructor(
    message: string,
    readonly index?: number,
  ) {
    super(message);
    this.name = "DealInputError";
  }
}
