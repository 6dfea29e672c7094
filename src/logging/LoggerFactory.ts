/**
 * Logger Factory
 *
 * Creates the root winston logger and caches per-component Logger wrappers.
 *
 *   const logger = getLogger('history-reader');
 *   logger.info('Collected deployments', { environment: 'prod', count: 2 });
 *
 * getLogger() lazily initializes with defaults when initializeLogging() was
 * never called (tests, library use).
 */

import winston from 'winston';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { LogLevel } from './levels.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** Winston uses lower numbers for higher priority */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

export interface LoggingOptions {
  /** Overrides LOG_LEVEL (the CLI's --verbose maps to DEBUG) */
  level?: LogLevel;
  additionalTransports?: LogTransport[];
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

export function initializeLogging(options: LoggingOptions = {}): void {
  const config = getLoggingConfig();

  currentGlobalLevel = options.level ?? config.logLevel;

  const transports: winston.transport[] = [new ConsoleTransport(config.logFormat).createWinstonTransport()];
  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }
  for (const t of options.additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger so component overrides can go below the global level
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }
}

function ensureInitialized(): winston.Logger {
  if (!rootLogger) {
    initializeLogging();
  }
  if (!rootLogger) {
    throw new Error('Logging failed to initialize');
  }
  return rootLogger;
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized());
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes before the process exits.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
