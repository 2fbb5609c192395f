import { FONT_WEIGHT_VALUES, type TextStyle } from '@selectext/contracts';
import { Logger } from '@selectext/common';
import { fontShorthand } from '@selectext/style-engine';
import { getMeasurementConfig } from './config.js';
import { getMeasuredTextWidth } from './measurement-cache.js';

/**
 * Deterministic glyph model:
 * - wide code points (CJK ideographs, kana, Hangul, fullwidth forms): 1em
 * - everything else: 0.5em, or 0.55em at semibold and heavier
 * - tracking is added after every code point, as it is for canvas text
 */
const NARROW_ADVANCE_EM = 0.5;
const HEAVY_NARROW_ADVANCE_EM = 0.55;
const WIDE_ADVANCE_EM = 1;
const HEAVY_WEIGHT_THRESHOLD = FONT_WEIGHT_VALUES.semibold;

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f], // Hangul Jamo
  [0x2e80, 0x303e], // CJK radicals, ideographic punctuation
  [0x3041, 0x33ff], // Hiragana, Katakana, CJK compatibility
  [0x3400, 0x4dbf], // CJK Extension A
  [0x4e00, 0x9fff], // CJK Unified Ideographs
  [0xa000, 0xa4cf], // Yi
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility ideographs
  [0xfe30, 0xfe4f], // CJK compatibility forms
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x20000, 0x3fffd], // CJK Extensions B and later
];

export function isWideCodePoint(codePoint: number): boolean {
  for (const [from, to] of WIDE_RANGES) {
    if (codePoint < from) return false;
    if (codePoint <= to) return true;
  }
  return false;
}

const logger = new Logger(false, 'selectext:measuring');

let canvasContext: CanvasRenderingContext2D | null = null;
let warnedMissingCanvas = false;

/**
 * Lazily creates and caches a canvas 2D context. Returns null outside a DOM
 * or where the environment has no canvas implementation.
 */
function getCanvasContext(): CanvasRenderingContext2D | null {
  if (canvasContext) return canvasContext;
  if (typeof document === 'undefined') return null;
  canvasContext = document.createElement('canvas').getContext('2d');
  return canvasContext;
}

/** Drops the cached canvas context and re-arms the missing-canvas warning. */
export function releaseCanvasContext(): void {
  canvasContext = null;
  warnedMissingCanvas = false;
}

const roundWidth = (value: number): number => Math.round(value * 100) / 100;

function deterministicWidth(segment: string, style: TextStyle): number {
  const weight = FONT_WEIGHT_VALUES[style.fontWeight] ?? FONT_WEIGHT_VALUES.regular;
  const narrowEm = weight >= HEAVY_WEIGHT_THRESHOLD ? HEAVY_NARROW_ADVANCE_EM : NARROW_ADVANCE_EM;
  let width = 0;
  for (const char of segment) {
    const codePoint = char.codePointAt(0) ?? 0;
    const em = isWideCodePoint(codePoint) ? WIDE_ADVANCE_EM : narrowEm;
    width += style.fontSize * em + style.tracking;
  }
  return roundWidth(width);
}

function canvasWidth(segment: string, style: TextStyle, ctx: CanvasRenderingContext2D, family: string): number {
  ctx.font = fontShorthand(style, family);
  return ctx.measureText(segment).width + style.tracking * Array.from(segment).length;
}

/**
 * Advance width of `segment` under `style`, tracking included.
 *
 * Browser mode falls back to the deterministic model (warning once) when no
 * canvas context can be created.
 */
export function measureSegmentWidth(segment: string, style: TextStyle): number {
  const config = getMeasurementConfig();
  const ctx = config.mode === 'browser' ? getCanvasContext() : null;

  if (config.mode === 'browser' && !ctx && !warnedMissingCanvas) {
    warnedMissingCanvas = true;
    logger.warn('Canvas 2D context unavailable; falling back to deterministic glyph metrics');
  }

  const mode = ctx ? 'browser' : 'deterministic';
  const key = `${mode}|${fontShorthand(style, config.fonts.family)}|${style.tracking}|${segment}`;
  return getMeasuredTextWidth(key, () =>
    ctx ? canvasWidth(segment, style, ctx, config.fonts.family) : deterministicWidth(segment, style),
  );
}
