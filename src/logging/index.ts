export { LogLevel, parseLogLevel } from './levels.js';
export { Logger } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export type { LoggingOptions } from './LoggerFactory.js';
export { setComponentLevel, clearComponentLevel, resetDebugRegistry } from './DebugModeRegistry.js';
export type { LogTransport } from './transports.js';
