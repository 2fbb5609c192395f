/**
 * Text measurer for selectable text surfaces.
 *
 * Responsibilities:
 * - Measure segment widths (canvas in the browser, a fixed glyph model elsewhere)
 * - Greedy word-wrap line breaking at a width
 * - Height of the wrapped block: lines × lineHeight + gaps × lineSpacing
 *
 * Edge cases:
 * - Empty text is one empty line, never zero height
 * - A zero-width slot lays nothing out: the text is reported as one unwrapped line
 * - Negative or non-finite widths are treated as zero
 */

import type { LayoutRequest, MeasuredLine, TextMeasure, TextStyle } from '@selectext/contracts';
import { DEFAULT_TEXT_STYLE, baseLineHeight } from '@selectext/style-engine';
import { getMeasurementConfig } from './config.js';
import { breakLines } from './line-breaker.js';
import { measureSegmentWidth } from './glyph-metrics.js';

export {
  configureMeasurement,
  getMeasurementConfig,
  resetMeasurementConfig,
  type MeasurementConfig,
  type MeasurementConfigOptions,
  type MeasurementMode,
} from './config.js';
export { clearMeasurementCache, getCacheSize } from './measurement-cache.js';
export { isWideCodePoint, measureSegmentWidth, releaseCanvasContext } from './glyph-metrics.js';
export { breakLines, type SegmentMeasurer } from './line-breaker.js';

const roundValue = (value: number): number =>
  getMeasurementConfig().mode === 'deterministic' ? Math.round(value * 10) / 10 : value;

/** Clamps widths that are negative, NaN or infinite to zero. */
export function sanitizeWidth(width: number): number {
  return Number.isFinite(width) && width > 0 ? width : 0;
}

/**
 * Production builds skip style validation, so measurement clamps whatever it is
 * handed instead of producing NaN geometry.
 */
function normalizeStyle(style: TextStyle): TextStyle {
  const fontSize = Number.isFinite(style.fontSize) && style.fontSize > 0 ? style.fontSize : DEFAULT_TEXT_STYLE.fontSize;
  const lineSpacing = Number.isFinite(style.lineSpacing) && style.lineSpacing > 0 ? style.lineSpacing : 0;
  const tracking = Number.isFinite(style.tracking) ? style.tracking : 0;
  if (fontSize === style.fontSize && lineSpacing === style.lineSpacing && tracking === style.tracking) {
    return style;
  }
  return { ...style, fontSize, lineSpacing, tracking };
}

export function measureText(request: LayoutRequest): TextMeasure {
  const style = normalizeStyle(request.style);
  const width = sanitizeWidth(request.width);
  const lineHeight = roundValue(baseLineHeight(style.fontSize));

  const lines: MeasuredLine[] =
    width > 0
      ? breakLines(request.text, width, (segment) => measureSegmentWidth(segment, style))
      : [{ fromChar: 0, toChar: request.text.length, width: 0 }];

  const gaps = lines.length - 1;
  return {
    kind: 'text',
    lines,
    lineHeight,
    totalHeight: roundValue(lines.length * lineHeight + gaps * style.lineSpacing),
  };
}

/** Minimal height containing every wrapped line of `request.text` at `request.width`. */
export function measureTextHeight(request: LayoutRequest): number {
  return measureText(request).totalHeight;
}
