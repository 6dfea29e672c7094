/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Operators can turn on DEBUG/TRACE for
 * one component (e.g. "history-reader") without flooding the rest of the
 * output:
 *
 *   PROMOTE_DEBUG_COMPONENTS=history-reader,registry-client:TRACE
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './levels.js';

const overrides = new Map<string, LogLevel>();

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

/**
 * Clear a component's level override, reverting to global level.
 */
export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * Effective level for a component. Child components ("a.b") inherit the
 * override of their parent ("a") when they have none of their own.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current = name;
  for (;;) {
    const level = overrides.get(current);
    if (level) return level;
    const dot = current.lastIndexOf('.');
    if (dot === -1) return globalLevel;
    current = current.substring(0, dot);
  }
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries like ["history-reader", "registry-client:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
