import type { CSSProperties } from 'react';
import type { TextRange, TextStyle } from '@selectext/contracts';
import type { MeasurementScheduler } from '@selectext/layout-bridge';
import type { SelectableTextSurface } from '@selectext/text-surface';

/**
 * Types for @selectext/react
 */

// =============================================================================
// Component Props
// =============================================================================

/** Callbacks are kept in a ref; changing them never rebuilds the surface. */
export interface CallbackProps {
  /** Fired after a measurement, only when the height changed. */
  onHeightChange?: (height: number) => void;
}

export interface SelectableTextProps extends CallbackProps {
  /** Text to display. Hard line breaks (`\n`, `\r\n`, `\r`) are kept. */
  text: string;

  /** Glyph geometry and color. Defaults to the unstyled baseline. */
  textStyle?: TextStyle;

  /**
   * Width offered by the parent, in px. When omitted the wrapper's own width is
   * observed instead.
   */
  availableWidth?: number;

  /** Defers measurement past the commit. Defaults to the next macrotask. */
  schedule?: MeasurementScheduler;

  /** Height differences at or below this many px are ignored. Rebuilds the bridge when changed. */
  heightEpsilon?: number;

  /** Logs layout decisions to the console. Rebuilds the bridge when changed. */
  enableLogging?: boolean;

  /** Id of the wrapper element. Generated when omitted. */
  id?: string;

  /** Extra class names for the wrapper element. */
  className?: string;

  /** Merged into the wrapper's inline style; `height` is always the measured height. */
  wrapperStyle?: CSSProperties;
}

// =============================================================================
// Ref Handle
// =============================================================================

export interface SelectableTextRef {
  /** The imperative surface, or null before the first layout effect. */
  getSurface(): SelectableTextSurface | null;
  /** Last reported height in px. */
  getHeight(): number;
  selectRange(start: number, end: number): void;
  getSelectedText(): string;
  /** Resolves to false when nothing is selected or the clipboard refused the write. */
  copySelection(): Promise<boolean>;
}

export type { TextRange, TextStyle };
