import type { TextStyle } from '@selectext/contracts';
import { SYSTEM_COLORS } from './colors.js';
import { createTextStyle } from './text-style.js';

export type TextStylePresetName = 'body' | 'title';

export const TEXT_STYLE_PRESETS: Readonly<Record<TextStylePresetName, TextStyle>> = Object.freeze({
  /** Long-form copy: muted color, generous line spacing. */
  body: createTextStyle({
    fontSize: 16,
    fontWeight: 'regular',
    color: SYSTEM_COLORS.gray,
    lineSpacing: 6,
    tracking: 0,
  }),
  /** Headings: large, bold, standard color, slightly open tracking. */
  title: createTextStyle({
    fontSize: 24,
    fontWeight: 'bold',
    color: SYSTEM_COLORS.label,
    lineSpacing: 8,
    tracking: 0.5,
  }),
});

export function resolveTextStylePreset(name: TextStylePresetName): TextStyle {
  return TEXT_STYLE_PRESETS[name];
}
