/**
 * PromotionContext tests: configuration precedence, token preflight and
 * error reporting.
 */

jest.mock('../../../../src/cli/lib/ConfigManager.js', () => ({
  ConfigManager: {
    getAll: jest.fn(() => ({ repo: 'stored/shop' })),
  },
}));

import chalk from 'chalk';
import { loadConfig, reportError, requireToken } from '../../../../src/cli/lib/PromotionContext.js';
import { OutputFormatter } from '../../../../src/cli/lib/OutputFormatter.js';
import { InvalidConfigurationError, NotFoundError } from '../../../../src/promotion/errors.js';

describe('PromotionContext', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('loadConfig', () => {
    it('should fall back to the stored repository', () => {
      expect(loadConfig({}, {}).repository).toBe('stored/shop');
    });

    it('should let --repo override the environment', () => {
      expect(loadConfig({ repo: 'cli/shop' }, { PROMOTE_REPO: 'env/shop' }).repository).toBe('cli/shop');
    });
  });

  describe('requireToken', () => {
    it('should reject a configuration without a token', () => {
      expect(() => requireToken(loadConfig({}, {}))).toThrow(
        new InvalidConfigurationError('GitHub token not found: set GITHUB_TOKEN or GH_TOKEN')
      );
    });

    it('should accept GH_TOKEN', () => {
      expect(() => requireToken(loadConfig({}, { GH_TOKEN: 'test-secret' }))).not.toThrow();
    });
  });

  describe('reportError', () => {
    it('should print the decision context before the error', () => {
      const lines: string[] = [];
      jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
        lines.push(String(line));
      });
      const error = new NotFoundError('commit', 'abc1234').withContext({
        action: 'promote to staging',
        environment: 'staging',
      });

      reportError(new OutputFormatter(false), error, 'Promotion failed');

      expect(lines).toEqual([
        'While attempting: promote to staging',
        '  Environment: staging',
        '✖ NotFound: commit not found: abc1234',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should prefix unexpected errors with the fallback', () => {
      const lines: string[] = [];
      jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
        lines.push(String(line));
      });

      reportError(new OutputFormatter(false), new Error('disk full'), 'Promotion failed');

      expect(lines).toEqual(['✖ Promotion failed: disk full']);
    });
  });
});
