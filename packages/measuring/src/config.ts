import { SYSTEM_FONT_STACK } from '@selectext/contracts';
import { setCacheSize } from './measurement-cache.js';

/**
 * - `browser`: segment widths come from a canvas 2D context.
 * - `deterministic`: widths come from a fixed glyph model; identical in every
 *   environment, used by tests and server-side layout.
 */
export type MeasurementMode = 'browser' | 'deterministic';

export type MeasurementConfig = {
  mode: MeasurementMode;
  fonts: {
    family: string;
  };
  cacheSize: number;
};

const DEFAULT_CACHE_SIZE = 5000;

const createDefaultConfig = (): MeasurementConfig => ({
  mode: 'browser',
  fonts: {
    family: SYSTEM_FONT_STACK,
  },
  cacheSize: DEFAULT_CACHE_SIZE,
});

const measurementConfig: MeasurementConfig = createDefaultConfig();

export type MeasurementConfigOptions = Partial<Omit<MeasurementConfig, 'fonts'>> & {
  fonts?: Partial<MeasurementConfig['fonts']>;
};

export function configureMeasurement(options: MeasurementConfigOptions): void {
  if (options.mode) {
    measurementConfig.mode = options.mode;
  }
  if (options.fonts) {
    measurementConfig.fonts = {
      ...measurementConfig.fonts,
      ...options.fonts,
    };
  }
  if (typeof options.cacheSize === 'number' && Number.isFinite(options.cacheSize) && options.cacheSize > 0) {
    measurementConfig.cacheSize = options.cacheSize;
    setCacheSize(options.cacheSize);
  }
}

export function getMeasurementConfig(): Readonly<MeasurementConfig> {
  return measurementConfig;
}

export function resetMeasurementConfig(): void {
  const defaults = createDefaultConfig();
  measurementConfig.mode = defaults.mode;
  measurementConfig.fonts = defaults.fonts;
  measurementConfig.cacheSize = defaults.cacheSize;
  setCacheSize(defaults.cacheSize);
}
