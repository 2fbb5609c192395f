import { describe, it, expect } from 'vitest';
import type { LayoutRequest, TextStyle } from '@selectext/contracts';
import { DEFAULT_TEXT_STYLE, TEXT_STYLE_PRESETS, createTextStyle, rgba } from '@selectext/style-engine';
import { measureText, measureTextHeight, sanitizeWidth } from './index.js';

const body = TEXT_STYLE_PRESETS.body;
const title = TEXT_STYLE_PRESETS.title;

const request = (text: string, width: number, style: TextStyle = body): LayoutRequest => ({ text, width, style });

describe('measureText', () => {
  describe('basic measurement', () => {
    it('stacks hard lines with line spacing between them', () => {
      // 3 × lineHeight(16) + 2 × 6
      expect(measureTextHeight(request('A\nB\nC', 200))).toBe(67.2);
    });

    it('reports line ranges and content widths', () => {
      const measure = measureText(request('A\nB\nC', 200));

      expect(measure.kind).toBe('text');
      expect(measure.lineHeight).toBe(18.4);
      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 1, width: 8 },
        { fromChar: 2, toChar: 3, width: 8 },
        { fromChar: 4, toChar: 5, width: 8 },
      ]);
    });

    it('treats \\r\\n as a single break', () => {
      expect(measureText(request('A\r\nB', 200)).lines).toHaveLength(2);
    });

    it('measures a single line without spacing', () => {
      expect(measureTextHeight(request('Hello', 200))).toBe(18.4);
    });
  });

  describe('wrapping', () => {
    it('wraps at word boundaries and hangs the trailing space', () => {
      const measure = measureText(request('aaaa bbbb cccc', 80));

      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 10, width: 72 },
        { fromChar: 10, toChar: 14, width: 32 },
      ]);
      expect(measure.totalHeight).toBe(42.8);
    });

    it('breaks words wider than the line by character', () => {
      const measure = measureText(request('ab abcdefghij', 40));

      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 3, width: 16 },
        { fromChar: 3, toChar: 8, width: 40 },
        { fromChar: 8, toChar: 13, width: 40 },
      ]);
    });

    it('breaks after hyphens before falling back to characters', () => {
      const measure = measureText(request('aaa-bbbbb-cc', 48));

      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 4, width: 32 },
        { fromChar: 4, toChar: 10, width: 48 },
        { fromChar: 10, toChar: 12, width: 16 },
      ]);
      expect(measure.totalHeight).toBe(67.2);
    });

    it('keeps a hyphenated word together when it fits', () => {
      expect(measureText(request('well-known', 200)).lines).toEqual([{ fromChar: 0, toChar: 10, width: 80 }]);
    });

    it('breaks between wide characters', () => {
      const measure = measureText(request('テキスト', 40));

      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 2, width: 32 },
        { fromChar: 2, toChar: 4, width: 32 },
      ]);
    });

    it('applies weight and tracking of the title preset', () => {
      const measure = measureText(request('Title text here', 100, title));

      // bold 24px: 13.2 advance + 0.5 tracking per glyph
      expect(measure.lines).toEqual([
        { fromChar: 0, toChar: 6, width: 68.5 },
        { fromChar: 6, toChar: 11, width: 54.8 },
        { fromChar: 11, toChar: 15, width: 54.8 },
      ]);
      // 3 × 27.6 + 2 × 8
      expect(measure.totalHeight).toBe(98.8);
    });

    it('wraps 10,000 characters without spaces to a bounded height', () => {
      const measure = measureText(request('x'.repeat(10_000), 50));

      // 6 glyphs of 8px fit in 50px
      expect(measure.lines).toHaveLength(1667);
      expect(measure.totalHeight).toBe(40668.8);
      expect(Number.isFinite(measure.totalHeight)).toBe(true);
    });
  });

  describe('edge cases', () => {
    it('gives empty text one empty line', () => {
      expect(measureText(request('', 200)).lines).toEqual([{ fromChar: 0, toChar: 0, width: 0 }]);
      expect(measureTextHeight(request('', 200))).toBe(18.4);
    });

    it('adds an empty line for a trailing newline', () => {
      expect(measureTextHeight(request('A\n', 200))).toBe(42.8);
    });

    it('resolves zero width to a single line', () => {
      const measure = measureText(request('A\nB\nC', 0));

      expect(measure.lines).toEqual([{ fromChar: 0, toChar: 5, width: 0 }]);
      expect(measure.totalHeight).toBe(18.4);
    });

    it.each([-20, Number.NaN, Number.POSITIVE_INFINITY])('clamps width %s to zero', (width) => {
      expect(sanitizeWidth(width)).toBe(0);
      expect(measureTextHeight(request('A\nB\nC', width))).toBe(18.4);
    });

    it('clamps an invalid font size instead of producing NaN', () => {
      const broken: TextStyle = { ...DEFAULT_TEXT_STYLE, fontSize: -3, lineSpacing: Number.NaN };
      expect(measureTextHeight(request('A\nB', 200, broken))).toBe(36.8);
    });
  });

  describe('properties', () => {
    it('is idempotent for identical requests', () => {
      const first = measureTextHeight(request('The quick brown fox jumps over the lazy dog', 120));
      const second = measureTextHeight(request('The quick brown fox jumps over the lazy dog', 120));
      expect(second).toBe(first);
    });

    it('never shrinks as the width decreases', () => {
      const text = 'The quick brown fox jumps over the lazy dog';
      let previous = 0;
      for (let width = 400; width > 0; width -= 20) {
        const height = measureTextHeight(request(text, width));
        expect(height).toBeGreaterThanOrEqual(previous);
        previous = height;
      }
      // 20px holds two glyphs per line
      expect(previous).toBe(506.4);
    });

    it('ignores color', () => {
      const recolored = createTextStyle({ ...body, color: rgba(255, 0, 0, 0.5) });
      const text = 'The quick brown fox jumps over the lazy dog';
      expect(measureTextHeight(request(text, 150, recolored))).toBe(measureTextHeight(request(text, 150)));
    });

    it('lets tracking change height only when it changes wrapping', () => {
      const text = 'aaaa bbbb cccc';
      const looser = createTextStyle({ ...body, tracking: 0.2 });
      const muchLooser = createTextStyle({ ...body, tracking: 4 });

      expect(measureTextHeight(request(text, 200, looser))).toBe(measureTextHeight(request(text, 200)));
      expect(measureTextHeight(request(text, 80, muchLooser))).toBe(67.2);
    });
  });
});
