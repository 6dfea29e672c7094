/**
 * Promote and Rollback Commands
 *
 *   promote-cli promote staging 3f9a1c2e
 *   promote-cli promote prod --method full-pipeline
 *   promote-cli rollback prod
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getLogger } from '../../logging/index.js';
import { isDispatchMethod, isEnvironment } from '../../promotion/types.js';
import type { DispatchMethod, Environment, PromotionMode, PromotionOutcome } from '../../promotion/types.js';
import { PromotionStateMachine } from '../../promotion/PromotionStateMachine.js';
import { formatDispatchSummary, OutputFormatter } from '../lib/OutputFormatter.js';
import { createPromotionContext, loadConfig, reportError, requireToken } from '../lib/PromotionContext.js';
import { TerminalPrompter } from '../lib/TerminalPrompter.js';
import type { GlobalOptions, PromoteCommandOptions } from '../types/index.js';

const DEFAULT_METHOD: DispatchMethod = 're-tag-promote';

interface RunRequest {
  environment: string;
  commit?: string;
  mode: PromotionMode;
  method: string;
}

/**
 * Print the outcome. A declined promotion is a normal exit (code 0).
 */
export function reportOutcome(formatter: OutputFormatter, outcome: PromotionOutcome): void {
  if (outcome.status === 'declined') {
    if (formatter.isJson) {
      formatter.output('', { status: 'declined', reason: outcome.reason });
    } else {
      console.log(chalk.yellow(`Cancelled: ${outcome.reason}`));
    }
    return;
  }

  const { decision, handle } = outcome;
  formatter.output(formatDispatchSummary(decision, handle).join('\n'), {
    status: 'dispatched',
    environment: decision.environment,
    mode: decision.mode,
    method: decision.method,
    commit: decision.to.hash,
    image: decision.image,
    workflow: handle.workflow,
    inputs: handle.inputs,
    url: handle.url,
    dispatchedAt: handle.dispatchedAt,
  });
}

async function runPromotion(request: RunRequest, globalOpts: GlobalOptions): Promise<void> {
  const formatter = new OutputFormatter(globalOpts.json);
  // In JSON mode stdout carries the result; the conversation goes to stderr
  const prompter = new TerminalPrompter(process.stdin, globalOpts.json ? process.stderr : process.stdout);
  const logger = getLogger('cli');

  try {
    const config = loadConfig(globalOpts);

    const validation = new PromotionStateMachine(config.workflows).validate({
      environment: request.environment,
      mode: request.mode,
      method: request.method,
    });
    if (!validation.valid || !isEnvironment(request.environment) || !isDispatchMethod(request.method)) {
      formatter.error('Invalid request', validation.errors);
      process.exitCode = 1;
      return;
    }
    const environment: Environment = request.environment;
    const method: DispatchMethod = request.method;

    requireToken(config);

    const context = createPromotionContext(config, prompter, { verbose: globalOpts.verbose ?? false });
    logger.debug('Starting promotion', { environment, mode: request.mode, method, commit: request.commit });

    const outcome = await context.orchestrator.promote({
      environment,
      mode: request.mode,
      method,
      ...(request.commit ? { commitRef: request.commit } : {}),
    });
    reportOutcome(formatter, outcome);
  } catch (error) {
    reportError(formatter, error, 'Promotion failed');
  } finally {
    prompter.close();
  }
}

/**
 * Register promote and rollback commands
 */
export function registerPromoteCommands(program: Command): void {
  // ==========================================================================
  // promote <environment> [commit]
  // ==========================================================================
  program
    .command('promote <environment> [commit]')
    .description('Promote a commit to dev, staging or prod (select interactively when no commit is given)')
    .option('-m, --method <method>', 'Dispatch method: full-pipeline or re-tag-promote', DEFAULT_METHOD)
    .option('-e, --emergency', 'Emergency mode; without a commit, rolls back to the previous deployment')
    .action(async (environment: string, commit: string | undefined, options: PromoteCommandOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      await runPromotion(
        {
          environment,
          ...(commit ? { commit } : {}),
          mode: options.emergency ? 'emergency' : 'normal',
          method: options.method ?? DEFAULT_METHOD,
        },
        globalOpts
      );
    });

  // ==========================================================================
  // rollback [environment]
  // ==========================================================================
  program
    .command('rollback [environment]')
    .description('Emergency rollback to the previous successful deployment (default: prod)')
    .action(async (environment: string | undefined, _options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      await runPromotion({ environment: environment ?? 'prod', mode: 'emergency', method: DEFAULT_METHOD }, globalOpts);
    });
}

export default registerPromoteCommands;
