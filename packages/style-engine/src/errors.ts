export type TextStyleErrorCode =
  | 'INVALID_FONT_SIZE'
  | 'INVALID_FONT_WEIGHT'
  | 'INVALID_COLOR'
  | 'INVALID_LINE_SPACING'
  | 'INVALID_TRACKING';

/**
 * Thrown when a style descriptor carries values no renderer can honor.
 *
 * Consumers should prefer checking `error.code` over `instanceof` across package
 * boundaries.
 */
export class TextStyleValidationError extends Error {
  readonly code: TextStyleErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TextStyleErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TextStyleValidationError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, TextStyleValidationError.prototype);
  }
}
