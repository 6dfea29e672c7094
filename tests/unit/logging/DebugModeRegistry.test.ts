import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  clearComponentLevel,
  getEffectiveLevel,
  initFromEnv,
  resetDebugRegistry,
  setComponentLevel,
  shouldLog,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/levels.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  it('should use the global level when no override exists', () => {
    expect(getEffectiveLevel('aggregator', LogLevel.WARN)).toBe(LogLevel.WARN);
  });

  it('should apply a component override', () => {
    setComponentLevel('aggregator', LogLevel.TRACE);

    expect(getEffectiveLevel('aggregator', LogLevel.INFO)).toBe(LogLevel.TRACE);
    expect(getEffectiveLevel('dispatcher', LogLevel.INFO)).toBe(LogLevel.INFO);
  });

  it('should let child components inherit their parent override', () => {
    setComponentLevel('aggregator', LogLevel.DEBUG);

    expect(getEffectiveLevel('aggregator.releases', LogLevel.INFO)).toBe(LogLevel.DEBUG);
  });

  it('should prefer the most specific override', () => {
    setComponentLevel('aggregator', LogLevel.DEBUG);
    setComponentLevel('aggregator.releases', LogLevel.ERROR);

    expect(getEffectiveLevel('aggregator.releases', LogLevel.INFO)).toBe(LogLevel.ERROR);
  });

  it('should revert to the global level once cleared', () => {
    setComponentLevel('dispatcher', LogLevel.DEBUG);
    clearComponentLevel('dispatcher');

    expect(getEffectiveLevel('dispatcher', LogLevel.INFO)).toBe(LogLevel.INFO);
  });

  it('should filter messages by the effective level', () => {
    setComponentLevel('history-reader', LogLevel.DEBUG);

    expect(shouldLog('history-reader', LogLevel.DEBUG, LogLevel.INFO)).toBe(true);
    expect(shouldLog('history-reader', LogLevel.TRACE, LogLevel.INFO)).toBe(false);
    expect(shouldLog('dispatcher', LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });

  describe('initFromEnv', () => {
    it('should default entries without a level to DEBUG', () => {
      initFromEnv(['history-reader']);

      expect(getEffectiveLevel('history-reader', LogLevel.INFO)).toBe(LogLevel.DEBUG);
    });

    it('should honour an explicit level suffix', () => {
      initFromEnv(['registry-client:TRACE', 'dispatcher:warn']);

      expect(getEffectiveLevel('registry-client', LogLevel.INFO)).toBe(LogLevel.TRACE);
      expect(getEffectiveLevel('dispatcher', LogLevel.INFO)).toBe(LogLevel.WARN);
    });
  });
});
