/**
 * @selectext/contracts
 *
 * Types shared between the style engine, the measurer, the text surface and the
 * layout bridge. Only data shapes and capability interfaces live here.
 */

// ---------------------------------------------------------------------------
// Typography
// ---------------------------------------------------------------------------

export type FontWeight =
  | 'ultraLight'
  | 'thin'
  | 'light'
  | 'regular'
  | 'medium'
  | 'semibold'
  | 'bold'
  | 'heavy'
  | 'black';

/** Numeric CSS weight for each named weight. */
export const FONT_WEIGHT_VALUES: Readonly<Record<FontWeight, number>> = Object.freeze({
  ultraLight: 100,
  thin: 200,
  light: 300,
  regular: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
  heavy: 800,
  black: 900,
});

/** Color channels `r`, `g`, `b` in 0..255; alpha in 0..1. */
export type RGBA = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

/**
 * Immutable bundle of typography attributes.
 *
 * A style fully determines glyph geometry for a given text and width. `color`
 * is paint only and never affects measurement.
 */
export type TextStyle = Readonly<{
  fontSize: number;
  fontWeight: FontWeight;
  color: RGBA;
  /** Extra gap between consecutive lines, in px. */
  lineSpacing: number;
  /** Extra advance after every glyph, in px. May be negative. */
  tracking: number;
}>;

/** Default CSS font stack used for rendering and canvas measurement. */
export const SYSTEM_FONT_STACK =
  "system-ui, -apple-system, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif";

// ---------------------------------------------------------------------------
// Measurement
// ---------------------------------------------------------------------------

/** One layout pass worth of input. Created fresh per width report or text/style change. */
export type LayoutRequest = Readonly<{
  text: string;
  width: number;
  style: TextStyle;
}>;

export type MeasuredLine = {
  /** UTF-16 offset of the first character on the line. */
  fromChar: number;
  /** UTF-16 offset one past the last character on the line, hanging spaces included. */
  toChar: number;
  /** Content width in px, hanging spaces excluded. */
  width: number;
};

export type TextMeasure = {
  kind: 'text';
  lines: MeasuredLine[];
  lineHeight: number;
  totalHeight: number;
};

// ---------------------------------------------------------------------------
// Surface capabilities
// ---------------------------------------------------------------------------

export interface Renderable {
  /** Applies text, style and width to the retained widget. */
  configure(text: string, style: TextStyle, width: number): void;
}

export interface Measurable {
  /** Natural height at `width` with unbounded height. */
  measure(width: number): number;
}

export type TextSurface = Renderable & Measurable;

/** Half-open UTF-16 range within a surface's text. */
export type TextRange = Readonly<{
  start: number;
  end: number;
}>;
