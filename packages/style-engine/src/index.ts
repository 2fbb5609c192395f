/**
 * @selectext/style-engine
 *
 * Builds and validates style descriptors, owns the named presets, and turns a
 * text plus style into the styled run a surface renders.
 */

export { TextStyleValidationError, type TextStyleErrorCode } from './errors.js';
export { SYSTEM_COLORS, isSameColor, isValidColor, rgba, toCssColor } from './colors.js';
export { DEFAULT_TEXT_STYLE, assertValidTextStyle, createTextStyle, isSameTextStyle } from './text-style.js';
export { TEXT_STYLE_PRESETS, resolveTextStylePreset, type TextStylePresetName } from './presets.js';
export { SINGLE_LINE_HEIGHT_MULTIPLIER, baseLineHeight, fontShorthand, toCssPx } from './typography.js';
export { buildStyledRun, type StyledRun, type StyledRunCss, type StyledRunOptions } from './styled-run.js';
