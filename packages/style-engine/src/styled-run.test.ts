import { describe, it, expect, vi, afterEach } from 'vitest';
import { SYSTEM_FONT_STACK, type TextStyle } from '@selectext/contracts';
import { buildStyledRun } from './styled-run.js';
import { TEXT_STYLE_PRESETS } from './presets.js';
import { DEFAULT_TEXT_STYLE } from './text-style.js';
import { fontShorthand } from './typography.js';

describe('buildStyledRun', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('maps the body preset to CSS', () => {
    const run = buildStyledRun('Hello', TEXT_STYLE_PRESETS.body);

    expect(run.text).toBe('Hello');
    expect(run.css).toEqual({
      fontFamily: SYSTEM_FONT_STACK,
      fontSize: '16px',
      fontWeight: '400',
      color: 'rgba(128, 128, 128, 1)',
      letterSpacing: '0px',
      lineHeight: '24.4px',
      marginTop: '-3px',
      marginBottom: '-3px',
    });
  });

  it('maps the title preset weight, tracking and spacing', () => {
    const run = buildStyledRun('Title', TEXT_STYLE_PRESETS.title, { fontFamily: 'Noto Sans' });

    expect(run.css.fontWeight).toBe('700');
    expect(run.css.letterSpacing).toBe('0.5px');
    expect(run.css.lineHeight).toBe('35.6px');
    expect(run.css.marginTop).toBe('-4px');
    expect(run.css.fontFamily).toBe('Noto Sans');
  });

  it('shares the weight mapping with the canvas font shorthand', () => {
    const run = buildStyledRun('Title', TEXT_STYLE_PRESETS.title, { fontFamily: 'Noto Sans' });

    expect(fontShorthand(TEXT_STYLE_PRESETS.title, 'Noto Sans')).toBe('700 24px Noto Sans');
    expect(fontShorthand(TEXT_STYLE_PRESETS.title, 'Noto Sans').startsWith(`${run.css.fontWeight} `)).toBe(true);
  });

  it('uses no margins without line spacing', () => {
    const run = buildStyledRun('', DEFAULT_TEXT_STYLE);
    expect(run.css.lineHeight).toBe('18.4px');
    expect(run.css.marginTop).toBe('0px');
  });

  it('fails fast on an invalid style outside production', () => {
    const broken: TextStyle = { ...DEFAULT_TEXT_STYLE, fontSize: -1 };
    expect(() => buildStyledRun('x', broken)).toThrow('fontSize must be a positive number, got -1');
  });

  it('skips validation in production builds', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const broken: TextStyle = { ...DEFAULT_TEXT_STYLE, lineSpacing: -2 };
    expect(() => buildStyledRun('x', broken)).not.toThrow();
  });
});
