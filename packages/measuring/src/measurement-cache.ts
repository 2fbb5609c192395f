/**
 * Bounded LRU cache of segment widths.
 *
 * Keys combine mode, font, tracking and the segment itself, so a config change
 * never reads a width measured under different settings.
 */

let maxEntries = 5000;
const widthCache = new Map<string, number>();

const evictOverflow = () => {
  while (widthCache.size > maxEntries) {
    const oldest = widthCache.keys().next();
    if (oldest.done === true) return;
    widthCache.delete(oldest.value);
  }
};

export function getMeasuredTextWidth(key: string, compute: () => number): number {
  const cached = widthCache.get(key);
  if (cached !== undefined) {
    // Refresh recency.
    widthCache.delete(key);
    widthCache.set(key, cached);
    return cached;
  }
  const width = compute();
  widthCache.set(key, width);
  evictOverflow();
  return width;
}

export function setCacheSize(size: number): void {
  maxEntries = Math.max(1, Math.floor(size));
  evictOverflow();
}

export function getCacheSize(): number {
  return widthCache.size;
}

export function clearMeasurementCache(): void {
  widthCache.clear();
}
