import '@testing-library/jest-dom/vitest';
import { afterEach } from 'vitest';
import { clearMeasurementCache, configureMeasurement, resetMeasurementConfig } from '@selectext/measuring';

// jsdom has no canvas; every test measures with the deterministic glyph model.
configureMeasurement({ mode: 'deterministic' });

afterEach(() => {
  resetMeasurementConfig();
  configureMeasurement({ mode: 'deterministic' });
  clearMeasurementCache();
});
