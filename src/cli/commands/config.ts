/**
 * Configuration Commands
 *
 * Manages preferences stored by the conf package. Environment variables
 * override anything stored here; `config show` prints the merged result.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MAX_CANDIDATE_LIMIT } from '../../config/PromotionConfig.js';
import { DISPATCH_METHODS, ENVIRONMENTS, isDispatchMethod, isEnvironment } from '../../promotion/types.js';
import { ConfigManager } from '../lib/ConfigManager.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { loadConfig, reportError } from '../lib/PromotionContext.js';
import type { ConfigKey, GlobalOptions } from '../types/index.js';

/**
 * Configuration key descriptions
 */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  repo: 'GitHub repository hosting the workflows (owner/name)',
  apiUrl: 'GitHub API base URL',
  registry: 'Container registry host',
  imageRepository: 'Image repository path in the registry',
  trunkBranch: 'Trunk branch offered as a candidate source',
  dispatchRef: 'Git ref dispatched workflows run on',
  candidateLimit: `Number of candidate commits offered (1-${MAX_CANDIDATE_LIMIT})`,
  historyLimit: 'Runs fetched per history query',
};

const VALID_CONFIG_KEYS: ConfigKey[] = [
  'repo',
  'apiUrl',
  'registry',
  'imageRepository',
  'trunkBranch',
  'dispatchRef',
  'candidateLimit',
  'historyLimit',
];

function isConfigKey(key: string): key is ConfigKey {
  return VALID_CONFIG_KEYS.some((valid) => valid === key);
}

/**
 * Validate and store one preference. Returns an error message on rejection.
 */
export function applyConfigValue(key: ConfigKey, value: string): string | null {
  switch (key) {
    case 'candidateLimit':
    case 'historyLimit': {
      const parsed = parseInt(value, 10);
      const max = key === 'candidateLimit' ? MAX_CANDIDATE_LIMIT : 100;
      const min = key === 'candidateLimit' ? 1 : 2;
      if (isNaN(parsed) || parsed < min || parsed > max) {
        return `${key} must be an integer between ${min} and ${max}`;
      }
      ConfigManager.set(key, parsed);
      return null;
    }
    case 'repo':
      if (!/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/.test(value)) {
        return 'repo must look like "owner/name"';
      }
      ConfigManager.set(key, value);
      return null;
    case 'apiUrl':
      ConfigManager.set(key, value.replace(/\/+$/, ''));
      return null;
    case 'imageRepository':
      ConfigManager.set(key, value.toLowerCase());
      return null;
    case 'registry':
    case 'trunkBranch':
    case 'dispatchRef':
      ConfigManager.set(key, value);
      return null;
  }
}

/**
 * Register config commands
 */
export function registerConfigCommands(program: Command): void {
  const configCmd = program.command('config').description('View or manage stored preferences');

  // ==========================================================================
  // config (no args) - show stored preferences
  // ==========================================================================
  configCmd.action((_options: unknown, cmd: Command) => {
    const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
    const stored = ConfigManager.getAll();
    const configPath = ConfigManager.getPath();

    if (globalOpts.json) {
      console.log(JSON.stringify({ path: configPath, config: stored }, null, 2));
      return;
    }

    console.log(chalk.bold('Stored preferences'));
    console.log(chalk.gray(`  Path: ${configPath}`));
    console.log();
    for (const [key, value] of Object.entries(stored)) {
      if (value === undefined) continue;
      console.log(`  ${chalk.cyan(key)}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
      if (isConfigKey(key)) {
        console.log(chalk.gray(`    ${CONFIG_DESCRIPTIONS[key]}`));
      }
    }
  });

  // ==========================================================================
  // config show - effective configuration
  // ==========================================================================
  configCmd
    .command('show')
    .description('Show the effective configuration (environment > stored > defaults)')
    .action((_options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);
      try {
        const config = loadConfig(globalOpts);
        const printable = {
          ...config,
          token: config.token ? '(set)' : '(not set)',
          registry: { ...config.registry, token: config.registry.token ? '(set)' : '(not set)' },
        };
        formatter.output(JSON.stringify(printable, null, 2), printable);
      } catch (error) {
        reportError(formatter, error, 'Failed to load configuration');
      }
    });

  // ==========================================================================
  // config get <key>
  // ==========================================================================
  configCmd
    .command('get <key>')
    .description('Get a stored preference')
    .action((key: string, _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isConfigKey(key)) {
        formatter.error(`Invalid configuration key: ${key}`, [`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`]);
        process.exitCode = 1;
        return;
      }

      const value = ConfigManager.get(key);
      if (globalOpts.json) {
        console.log(JSON.stringify({ [key]: value ?? null }, null, 2));
      } else {
        console.log(value !== undefined ? String(value) : chalk.gray('(not set)'));
      }
    });

  // ==========================================================================
  // config set <key> <value>
  // ==========================================================================
  configCmd
    .command('set <key> <value>')
    .description('Set a stored preference')
    .action((key: string, value: string, _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isConfigKey(key)) {
        formatter.error(`Invalid configuration key: ${key}`, [`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`]);
        process.exitCode = 1;
        return;
      }

      const problem = applyConfigValue(key, value);
      if (problem) {
        formatter.error(problem);
        process.exitCode = 1;
        return;
      }
      formatter.success(`Set ${key} = ${String(ConfigManager.get(key))}`);
    });

  // ==========================================================================
  // config unset <key>
  // ==========================================================================
  configCmd
    .command('unset <key>')
    .description('Remove a stored preference (fall back to the default)')
    .action((key: string, _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isConfigKey(key)) {
        formatter.error(`Invalid configuration key: ${key}`, [`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`]);
        process.exitCode = 1;
        return;
      }

      ConfigManager.delete(key);
      formatter.success(`Unset ${key}`);
    });

  // ==========================================================================
  // config workflow <environment> <method> <workflow>
  // ==========================================================================
  configCmd
    .command('workflow <environment> <method> <workflow>')
    .description('Override the workflow dispatched for an environment and method')
    .action((environment: string, method: string, workflow: string, _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isEnvironment(environment) || !isDispatchMethod(method)) {
        formatter.error('Invalid environment or method', [
          `Environments: ${ENVIRONMENTS.join(', ')}`,
          `Methods: ${DISPATCH_METHODS.join(', ')}`,
        ]);
        process.exitCode = 1;
        return;
      }

      ConfigManager.setWorkflow(environment, method, workflow);
      formatter.success(`${environment}/${method} now dispatches "${workflow}"`);
    });

  // ==========================================================================
  // config history-workflows <environment> <workflows...>
  // ==========================================================================
  configCmd
    .command('history-workflows <environment> <workflows...>')
    .description('Set the workflows read, in order, for an environment\'s deployment history')
    .action((environment: string, workflows: string[], _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!isEnvironment(environment)) {
        formatter.error(`Unknown environment: ${environment}`, [`Environments: ${ENVIRONMENTS.join(', ')}`]);
        process.exitCode = 1;
        return;
      }

      ConfigManager.setHistoryWorkflows(environment, workflows);
      formatter.success(`${environment} history reads: ${workflows.map((w) => `"${w}"`).join(', ')}`);
    });

  // ==========================================================================
  // config reset
  // ==========================================================================
  configCmd
    .command('reset')
    .description('Remove all stored preferences')
    .option('-f, --force', 'Skip confirmation')
    .action((options: { force?: boolean }, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);

      if (!options.force && !globalOpts.json) {
        console.log(chalk.yellow('This will remove all stored preferences.'));
        console.log('Use --force to skip this confirmation.');
        return;
      }

      ConfigManager.reset();
      formatter.success('Preferences reset to defaults');
    });

  // ==========================================================================
  // config list
  // ==========================================================================
  configCmd
    .command('list')
    .description('List all available configuration keys')
    .action((_options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();

      if (globalOpts.json) {
        const keys = VALID_CONFIG_KEYS.map((key) => ({ key, description: CONFIG_DESCRIPTIONS[key] }));
        console.log(JSON.stringify({ keys }, null, 2));
        return;
      }

      console.log(chalk.bold('Available Configuration Keys:'));
      console.log();
      for (const key of VALID_CONFIG_KEYS) {
        console.log(`  ${chalk.cyan(key)}`);
        console.log(chalk.gray(`    ${CONFIG_DESCRIPTIONS[key]}`));
      }
    });
}

export default registerConfigCommands;
