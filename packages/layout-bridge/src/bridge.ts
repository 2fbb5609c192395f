import type { LayoutRequest, TextSurface } from '@selectext/contracts';
import { Logger } from '@selectext/common';
import { sanitizeWidth } from '@selectext/measuring';
import { isSameTextStyle } from '@selectext/style-engine';
import { scheduleNextTick, type MeasurementScheduler } from './scheduler.js';

/**
 * - `uninitialized`: no request committed yet
 * - `measuring`: a request was committed; its measurement is pending
 * - `rendered`: the cached height belongs to the committed request
 * - `disposed`: terminal
 */
export type BridgePhase = 'uninitialized' | 'measuring' | 'rendered' | 'disposed';

export type HeightChangeListener = (height: number, request: LayoutRequest) => void;

export type MeasuredTextBridgeOptions = {
  /** Defers measurement past the current commit. Defaults to the next macrotask. */
  schedule?: MeasurementScheduler;
  /** Height differences at or below this many px are not reported. Defaults to 0.01. */
  heightEpsilon?: number;
  /** Enables debug logging. */
  enableLogging?: boolean;
  logger?: Logger;
};

export const DEFAULT_HEIGHT_EPSILON = 0.01;

const isSameRequest = (a: LayoutRequest, b: LayoutRequest): boolean =>
  a.text === b.text && a.width === b.width && isSameTextStyle(a.style, b.style);

/**
 * Reconciles a retained text surface with a declarative layout pass.
 *
 * Width flows in through `update()`, which configures the surface and returns the
 * last known height. Height flows out asynchronously: one measurement per burst
 * of updates runs after the commit, always against the latest request, and
 * listeners hear about it only when the height actually changed.
 */
export class MeasuredTextBridge {
  private readonly surface: TextSurface;
  private readonly schedule: MeasurementScheduler;
  private readonly heightEpsilon: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<HeightChangeListener>();

  private committed: LayoutRequest | null = null;
  private currentHeight = 0;
  private currentPhase: BridgePhase = 'uninitialized';
  private measurementPending = false;
  private measurements = 0;

  constructor(surface: TextSurface, options: MeasuredTextBridgeOptions = {}) {
    this.surface = surface;
    this.schedule = options.schedule ?? scheduleNextTick;
    this.heightEpsilon =
      typeof options.heightEpsilon === 'number' && Number.isFinite(options.heightEpsilon) && options.heightEpsilon >= 0
        ? options.heightEpsilon
        : DEFAULT_HEIGHT_EPSILON;
    this.logger = options.logger ?? new Logger(options.enableLogging ?? false, 'selectext:bridge');
  }

  /** Last reported height; may trail the committed request by one measurement. */
  get height(): number {
    return this.currentHeight;
  }

  get phase(): BridgePhase {
    return this.currentPhase;
  }

  get request(): LayoutRequest | null {
    return this.committed;
  }

  get hasPendingMeasurement(): boolean {
    return this.measurementPending;
  }

  /** Number of measurements actually run. */
  get measurementCount(): number {
    return this.measurements;
  }

  onHeightChange(listener: HeightChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Commit phase: applies the request to the surface when any of text, width or
   * style changed, and schedules a measurement.
   *
   * @returns the current, possibly one-measurement-stale, height
   */
  update(request: LayoutRequest): number {
    if (this.currentPhase === 'disposed') {
      this.logger.warn('update() called after dispose(); ignoring');
      return this.currentHeight;
    }

    const width = sanitizeWidth(request.width);
    if (width !== request.width) {
      this.logger.debug(`Clamped width ${request.width} to ${width}`);
    }

    const next: LayoutRequest = { text: request.text, width, style: request.style };
    if (this.committed && isSameRequest(this.committed, next)) {
      return this.currentHeight;
    }

    this.surface.configure(next.text, next.style, next.width);
    this.committed = next;
    this.currentPhase = 'measuring';
    this.scheduleMeasurement();
    return this.currentHeight;
  }

  private scheduleMeasurement(): void {
    if (this.measurementPending) return;
    this.measurementPending = true;
    this.schedule(() => this.runMeasurement());
  }

  private runMeasurement(): void {
    this.measurementPending = false;
    const request = this.committed;
    if (this.currentPhase === 'disposed' || !request) return;

    let measured: number;
    try {
      measured = this.surface.measure(request.width);
    } catch (error) {
      this.currentPhase = 'rendered';
      this.logger.error('Measurement failed:', error);
      return;
    }
    this.measurements += 1;
    this.currentPhase = 'rendered';

    if (!Number.isFinite(measured) || measured < 0) {
      this.logger.warn(`Discarding invalid measured height ${measured}`);
      return;
    }

    if (Math.abs(measured - this.currentHeight) <= this.heightEpsilon) {
      this.logger.debug(`Height unchanged at ${this.currentHeight}px for width ${request.width}`);
      return;
    }

    this.logger.debug(`Height ${this.currentHeight}px -> ${measured}px at width ${request.width}`);
    this.currentHeight = measured;
    this.notify(measured, request);
  }

  private notify(height: number, request: LayoutRequest): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(height, request);
      } catch (error) {
        this.logger.error('Height change listener failed:', error);
      }
    }
  }

  dispose(): void {
    if (this.currentPhase === 'disposed') return;
    this.currentPhase = 'disposed';
    this.listeners.clear();
    this.committed = null;
  }
}
