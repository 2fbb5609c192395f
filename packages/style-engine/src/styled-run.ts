import { FONT_WEIGHT_VALUES, SYSTEM_FONT_STACK, type TextStyle } from '@selectext/contracts';
import { isProductionBuild } from '@selectext/common';
import { toCssColor } from './colors.js';
import { assertValidTextStyle } from './text-style.js';
import { baseLineHeight, toCssPx } from './typography.js';

/** CSS declarations a surface applies for one styled run. */
export type StyledRunCss = {
  fontFamily: string;
  fontSize: string;
  fontWeight: string;
  color: string;
  letterSpacing: string;
  lineHeight: string;
  marginTop: string;
  marginBottom: string;
};

export type StyledRun = {
  text: string;
  style: TextStyle;
  css: StyledRunCss;
};

export type StyledRunOptions = {
  fontFamily?: string;
};

/**
 * Combines text with a style's font, color, line spacing and tracking into one run.
 * Measurement builds its canvas font from the same style with `fontShorthand`.
 *
 * CSS spreads `line-height` evenly above and below each line, while line spacing
 * only belongs between lines. The negative margins remove half a gap at the top
 * and bottom so the rendered block is exactly
 * `lines * lineHeight + (lines - 1) * lineSpacing` tall.
 *
 * @example
 * buildStyledRun('Hi', TEXT_STYLE_PRESETS.body).css.lineHeight // '24.4px'
 */
export function buildStyledRun(text: string, style: TextStyle, options: StyledRunOptions = {}): StyledRun {
  if (!isProductionBuild()) {
    assertValidTextStyle(style);
  }

  const fontFamily = options.fontFamily ?? SYSTEM_FONT_STACK;
  const weight = FONT_WEIGHT_VALUES[style.fontWeight] ?? FONT_WEIGHT_VALUES.regular;
  const halfGap = style.lineSpacing / 2;

  return {
    text,
    style,
    css: {
      fontFamily,
      fontSize: toCssPx(style.fontSize),
      fontWeight: String(weight),
      color: toCssColor(style.color),
      letterSpacing: toCssPx(style.tracking),
      lineHeight: toCssPx(baseLineHeight(style.fontSize) + style.lineSpacing),
      marginTop: toCssPx(halfGap === 0 ? 0 : -halfGap),
      marginBottom: toCssPx(halfGap === 0 ? 0 : -halfGap),
    },
  };
}
