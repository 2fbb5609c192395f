/** @module utils */

import { cloneElement, useLayoutEffect, useState, type ReactElement, type RefObject } from 'react';
import type { TextStyle } from '@selectext/contracts';
import type { SelectableTextProps } from './types';

const px = (value: string): number => {
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

/** Content-box width, the same box ResizeObserver reports as `contentRect`. */
const readWidth = (element: HTMLElement): number => {
  const { paddingLeft, paddingRight } = window.getComputedStyle(element);
  return Math.max(0, element.clientWidth - px(paddingLeft) - px(paddingRight));
};

/**
 * Tracks the content width of `ref`'s element while `enabled`.
 *
 * Uses ResizeObserver where the host has one and falls back to window `resize`
 * events otherwise. Starts at 0 until the first layout effect reads the element.
 */
export function useObservedWidth(ref: RefObject<HTMLElement>, enabled: boolean): number {
  const [width, setWidth] = useState(0);

  useLayoutEffect(() => {
    const element = ref.current;
    if (!enabled || !element) return;

    setWidth(readWidth(element));

    if (typeof ResizeObserver === 'function') {
      const observer = new ResizeObserver((entries) => {
        for (const entry of entries) {
          if (entry.target === element) setWidth(entry.contentRect.width);
        }
      });
      observer.observe(element);
      return () => observer.disconnect();
    }

    const handleResize = () => setWidth(readWidth(element));
    window.addEventListener('resize', handleResize);
    return () => window.removeEventListener('resize', handleResize);
  }, [ref, enabled]);

  return width;
}

/**
 * Returns a copy of a `SelectableText` element with its style replaced.
 * The original element is left untouched.
 *
 * @example
 * const heading = withTextStyle(<SelectableText text='Release notes' />, TEXT_STYLE_PRESETS.title);
 */
export function withTextStyle(
  element: ReactElement<SelectableTextProps>,
  style: TextStyle,
): ReactElement<SelectableTextProps> {
  return cloneElement(element, { textStyle: style });
}
