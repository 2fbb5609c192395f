import { FONT_WEIGHT_VALUES, type TextStyle } from '@selectext/contracts';

/**
 * Single line spacing multiplier: line box height as a multiple of the font size.
 *
 * For example, a 16px font: 16 × 1.15 = 18.4px line height.
 */
export const SINGLE_LINE_HEIGHT_MULTIPLIER = 1.15;

export const baseLineHeight = (fontSize: number): number => fontSize * SINGLE_LINE_HEIGHT_MULTIPLIER;

/** Canvas font shorthand, e.g. `700 24px system-ui`. */
export const fontShorthand = (style: TextStyle, family: string): string =>
  `${FONT_WEIGHT_VALUES[style.fontWeight] ?? FONT_WEIGHT_VALUES.regular} ${style.fontSize}px ${family}`;

/** Rounds to two decimals for CSS output. */
export const toCssPx = (value: number): string => `${Math.round(value * 100) / 100}px`;
