import type { RGBA } from '@selectext/contracts';

export const rgba = (r: number, g: number, b: number, a = 1): RGBA => Object.freeze({ r, g, b, a });

export const SYSTEM_COLORS = Object.freeze({
  label: rgba(0, 0, 0),
  gray: rgba(128, 128, 128),
});

export const isValidColor = (color: RGBA): boolean => {
  const channelOk = (value: number) => Number.isFinite(value) && value >= 0 && value <= 255;
  return (
    channelOk(color.r) &&
    channelOk(color.g) &&
    channelOk(color.b) &&
    Number.isFinite(color.a) &&
    color.a >= 0 &&
    color.a <= 1
  );
};

export const isSameColor = (a: RGBA, b: RGBA): boolean => a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;

/**
 * @example
 * toCssColor(rgba(128, 128, 128)) // 'rgba(128, 128, 128, 1)'
 */
export function toCssColor(color: RGBA): string {
  return `rgba(${Math.round(color.r)}, ${Math.round(color.g)}, ${Math.round(color.b)}, ${color.a})`;
}
