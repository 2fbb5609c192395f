import type { MeasuredLine } from '@selectext/contracts';
import { isWideCodePoint } from './glyph-metrics.js';

export type SegmentMeasurer = (segment: string) => number;

const WIDTH_EPSILON = 0.01;
const PARAGRAPH_BREAK = /\r\n|\r|\n/g;
const HYPHEN = '-';

type TokenKind = 'space' | 'wide' | 'text';

type Token = {
  kind: TokenKind;
  start: number;
  end: number;
};

const classify = (char: string): TokenKind => {
  if (char === ' ' || char === '\t') return 'space';
  return isWideCodePoint(char.codePointAt(0) ?? 0) ? 'wide' : 'text';
};

/**
 * Splits `text[from, to)` into break opportunities: runs of spaces, runs of
 * narrow characters, and single wide characters (CJK text may break anywhere).
 * A hyphen ends its run, since lines may break after it.
 */
function tokenize(text: string, from: number, to: number): Token[] {
  const tokens: Token[] = [];
  let index = from;
  let previous = '';
  for (const char of text.slice(from, to)) {
    const kind = classify(char);
    const last = tokens[tokens.length - 1];
    if (last && last.kind === kind && kind !== 'wide' && previous !== HYPHEN) {
      last.end += char.length;
    } else {
      tokens.push({ kind, start: index, end: index + char.length });
    }
    index += char.length;
    previous = char;
  }
  return tokens;
}

function breakParagraph(
  text: string,
  from: number,
  to: number,
  maxWidth: number,
  measure: SegmentMeasurer,
  lines: MeasuredLine[],
): void {
  let lineStart = from;
  let width = 0;
  let contentWidth = 0;
  let hasContent = false;

  const pushLine = (end: number) => {
    lines.push({ fromChar: lineStart, toChar: end, width: contentWidth });
    lineStart = end;
    width = 0;
    contentWidth = 0;
    hasContent = false;
  };

  for (const token of tokenize(text, from, to)) {
    const tokenWidth = measure(text.slice(token.start, token.end));

    // Spaces hang past the line end and never force a break.
    if (token.kind === 'space') {
      width += tokenWidth;
      continue;
    }

    if (hasContent && width + tokenWidth > maxWidth + WIDTH_EPSILON) {
      pushLine(token.start);
    }

    if (width + tokenWidth <= maxWidth + WIDTH_EPSILON) {
      width += tokenWidth;
      contentWidth = width;
      hasContent = true;
      continue;
    }

    // Wider than a whole line: break by character, at least one per line.
    let index = token.start;
    for (const char of text.slice(token.start, token.end)) {
      const charWidth = measure(char);
      if (hasContent && width + charWidth > maxWidth + WIDTH_EPSILON) {
        pushLine(index);
      }
      width += charWidth;
      contentWidth = width;
      hasContent = true;
      index += char.length;
    }
  }

  lines.push({ fromChar: lineStart, toChar: to, width: contentWidth });
}

/**
 * Greedy word-wrap line breaking.
 *
 * Hard breaks (`\n`, `\r\n`, `\r`) always end a line; an empty paragraph is one
 * empty line, so `''` yields one line and `'a\n'` yields two.
 */
export function breakLines(text: string, maxWidth: number, measure: SegmentMeasurer): MeasuredLine[] {
  const lines: MeasuredLine[] = [];
  let start = 0;

  PARAGRAPH_BREAK.lastIndex = 0;
  let match = PARAGRAPH_BREAK.exec(text);
  while (match) {
    breakParagraph(text, start, match.index, maxWidth, measure, lines);
    start = match.index + match[0].length;
    match = PARAGRAPH_BREAK.exec(text);
  }
  breakParagraph(text, start, text.length, maxWidth, measure, lines);

  return lines;
}
