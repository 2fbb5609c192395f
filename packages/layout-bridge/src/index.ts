export {
  DEFAULT_HEIGHT_EPSILON,
  MeasuredTextBridge,
  type BridgePhase,
  type HeightChangeListener,
  type MeasuredTextBridgeOptions,
} from './bridge.js';
export { scheduleNextTick, type MeasurementScheduler, type MeasurementTask } from './scheduler.js';
