export { Logger, type LogSink } from './logger.js';
export { isProductionBuild } from './env.js';
