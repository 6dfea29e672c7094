/**
 * Logging Configuration
 *
 * Derived from environment variables:
 *   LOG_LEVEL                 minimum level (default INFO)
 *   PROMOTE_DEBUG_COMPONENTS  comma-separated component[:LEVEL] overrides
 *   LOG_FORMAT                'text' (default) or 'json'
 *   LOG_FILE                  optional file path, written in addition to stderr
 */

import { LogLevel, parseLogLevel } from './levels.js';

export interface LoggingConfiguration {
  logLevel: LogLevel;
  debugComponents: string[];
  logFormat: 'text' | 'json';
  logFile?: string;
}

function parseFormat(value: string | undefined): 'text' | 'json' {
  return value === 'json' ? 'json' : 'text';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(env: Record<string, string | undefined> = process.env): LoggingConfiguration {
  return {
    logLevel: parseLogLevel(env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(env['PROMOTE_DEBUG_COMPONENTS']),
    logFormat: parseFormat(env['LOG_FORMAT']),
    logFile: env['LOG_FILE'] || undefined,
  };
}
