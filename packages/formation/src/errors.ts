/**
 * @fileoverview Error classes for the formation module
 */

/**
 * Thrown when formation parameters fail validation
 */
export class InvalidFormationParamsError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'InvalidFormationParamsError';
    Object.setPrototypeOf(this, InvalidFormationParamsError.prototype);
  }
}
