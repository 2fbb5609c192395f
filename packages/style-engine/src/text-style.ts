import { FONT_WEIGHT_VALUES, type FontWeight, type TextStyle } from '@selectext/contracts';
import { SYSTEM_COLORS, isSameColor, isValidColor } from './colors.js';
import { TextStyleValidationError } from './errors.js';

/** Unstyled baseline: system font at 16px, label color, no extra spacing. */
export const DEFAULT_TEXT_STYLE: TextStyle = Object.freeze({
  fontSize: 16,
  fontWeight: 'regular',
  color: SYSTEM_COLORS.label,
  lineSpacing: 0,
  tracking: 0,
});

const isFontWeight = (value: string): value is FontWeight =>
  Object.prototype.hasOwnProperty.call(FONT_WEIGHT_VALUES, value);

/**
 * Throws a {@link TextStyleValidationError} for the first invalid field.
 */
export function assertValidTextStyle(style: TextStyle): void {
  if (!Number.isFinite(style.fontSize) || style.fontSize <= 0) {
    throw new TextStyleValidationError('INVALID_FONT_SIZE', `fontSize must be a positive number, got ${style.fontSize}`, {
      fontSize: style.fontSize,
    });
  }
  if (!isFontWeight(style.fontWeight)) {
    throw new TextStyleValidationError('INVALID_FONT_WEIGHT', `Unknown fontWeight "${style.fontWeight}"`, {
      fontWeight: style.fontWeight,
    });
  }
  if (!isValidColor(style.color)) {
    throw new TextStyleValidationError('INVALID_COLOR', 'color channels must be 0-255 with alpha 0-1', {
      color: style.color,
    });
  }
  if (!Number.isFinite(style.lineSpacing) || style.lineSpacing < 0) {
    throw new TextStyleValidationError(
      'INVALID_LINE_SPACING',
      `lineSpacing must be a non-negative number, got ${style.lineSpacing}`,
      { lineSpacing: style.lineSpacing },
    );
  }
  if (!Number.isFinite(style.tracking)) {
    throw new TextStyleValidationError('INVALID_TRACKING', `tracking must be finite, got ${style.tracking}`, {
      tracking: style.tracking,
    });
  }
}

/**
 * Builds a frozen style from the baseline plus overrides.
 *
 * @throws {TextStyleValidationError} when any resulting field is invalid
 */
export function createTextStyle(overrides: Partial<TextStyle> = {}): TextStyle {
  const style: TextStyle = Object.freeze({ ...DEFAULT_TEXT_STYLE, ...overrides });
  assertValidTextStyle(style);
  return style;
}

export function isSameTextStyle(a: TextStyle, b: TextStyle): boolean {
  if (a === b) return true;
  return (
    a.fontSize === b.fontSize &&
    a.fontWeight === b.fontWeight &&
    a.lineSpacing === b.lineSpacing &&
    a.tracking === b.tracking &&
    isSameColor(a.color, b.color)
  );
}
