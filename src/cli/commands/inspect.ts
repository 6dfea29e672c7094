/**
 * Inspection Commands
 *
 * Read-only views of what a promotion would act on: deployment history,
 * candidate commits, and the image derived for a commit.
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { MAX_CANDIDATE_LIMIT } from '../../config/PromotionConfig.js';
import { describeCommit } from '../../promotion/CommitRef.js';
import { formatImageReference } from '../../promotion/ImageReferenceResolver.js';
import { isEnvironment } from '../../promotion/types.js';
import type { Environment } from '../../promotion/types.js';
import {
  OutputFormatter,
  formatCandidateTable,
  formatDeploymentTable,
  formatImageCheck,
} from '../lib/OutputFormatter.js';
import { createPromotionContext, loadConfig, reportError, requireToken } from '../lib/PromotionContext.js';
import { TerminalPrompter } from '../lib/TerminalPrompter.js';
import type { CandidatesCommandOptions, GlobalOptions, HistoryCommandOptions } from '../types/index.js';

function parseLimit(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  // Spinner output goes to stderr, so it never mixes with --json results
  const spinner = ora({ text, stream: process.stderr }).start();
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}

function parseEnvironment(value: string, formatter: OutputFormatter): Environment | null {
  if (isEnvironment(value)) return value;
  formatter.error(`Unknown environment: '${value}' (expected dev, staging or prod)`);
  process.exitCode = 1;
  return null;
}

/**
 * Register history, candidates and image commands
 */
export function registerInspectionCommands(program: Command): void {
  // ==========================================================================
  // history <environment>
  // ==========================================================================
  program
    .command('history <environment>')
    .description('Show recent deployments of an environment')
    .option('-l, --limit <n>', 'Number of runs to show', '10')
    .action(async (env: string, options: HistoryCommandOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);
      const environment = parseEnvironment(env, formatter);
      if (!environment) return;

      const prompter = new TerminalPrompter();
      try {
        const config = loadConfig(globalOpts);
        requireToken(config);
        const context = createPromotionContext(config, prompter, { verbose: globalOpts.verbose ?? false });

        const records = await withSpinner(`Fetching ${environment} deployments...`, () =>
          context.history.recent(environment, config.historyWorkflows[environment], parseLimit(options.limit, 10))
        );

        if (records.length === 0 && !formatter.isJson) {
          formatter.warn(`No deployments found for ${environment}`);
          return;
        }
        formatter.output(formatDeploymentTable(records), records);
      } catch (error) {
        reportError(formatter, error, 'Failed to fetch deployment history');
      } finally {
        prompter.close();
      }
    });

  // ==========================================================================
  // candidates
  // ==========================================================================
  program
    .command('candidates')
    .description('List the commits offered for promotion')
    .option('-l, --limit <n>', 'Maximum number of commits (up to 20)')
    .action(async (options: CandidatesCommandOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);
      const prompter = new TerminalPrompter();

      try {
        const config = loadConfig(globalOpts);
        const context = createPromotionContext(config, prompter, { verbose: globalOpts.verbose ?? false });
        const limit = Math.min(parseLimit(options.limit, config.candidateLimit), MAX_CANDIDATE_LIMIT);

        const set = await withSpinner('Collecting candidate commits...', () => context.aggregator.candidates(limit));

        for (const source of set.failedSources) {
          formatter.warn(`Source unavailable: ${source}`);
        }
        formatter.output(formatCandidateTable(set), set);
        if (!formatter.isJson && set.partial.length > 0) {
          console.log(chalk.gray(`${set.partial.length} entr${set.partial.length === 1 ? 'y' : 'ies'} could not be resolved to a commit`));
        }
      } catch (error) {
        reportError(formatter, error, 'Failed to collect candidates');
      } finally {
        prompter.close();
      }
    });

  // ==========================================================================
  // image <commit>
  // ==========================================================================
  program
    .command('image <commit>')
    .description('Show the image for a commit and whether the registry has it')
    .option('--env <environment>', 'Apply the registry policy of this environment', 'dev')
    .action(async (commit: string, options: { env: string }, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(globalOpts.json);
      const environment = parseEnvironment(options.env, formatter);
      if (!environment) return;

      const prompter = new TerminalPrompter();
      try {
        const config = loadConfig(globalOpts);
        const context = createPromotionContext(config, prompter, { verbose: globalOpts.verbose ?? false });

        const resolved = await context.resolver.resolve(commit);
        const image = context.images.resolve(resolved);

        const check = await withSpinner(`Checking ${formatImageReference(image)}...`, () =>
          context.images.validate(environment, image)
        );

        formatter.output(
          [
            `Commit: ${describeCommit(resolved)}`,
            `Image:  ${formatImageReference(image)}`,
            `Check:  ${formatImageCheck(check)}`,
          ].join('\n'),
          { commit: resolved, image, reference: formatImageReference(image), check }
        );
      } catch (error) {
        reportError(formatter, error, 'Image check failed');
      } finally {
        prompter.close();
      }
    });
}

export default registerInspectionCommands;
