#!/usr/bin/env node
/**
 * Promotion CLI
 *
 * Promotes commits through dev, staging and prod, and rolls back, by
 * dispatching CI workflows behind explicit confirmation steps.
 *
 * Usage: promote-cli [options] <command> [arguments]
 *
 * Run `promote-cli --help` for detailed usage information.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { initializeLogging, LogLevel, shutdownLogging } from '../logging/index.js';
import { registerConfigCommands } from './commands/config.js';
import { registerInspectionCommands } from './commands/inspect.js';
import { registerPromoteCommands } from './commands/promote.js';
import type { GlobalOptions } from './types/index.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('promote-cli')
    .description('Promote and roll back releases across dev, staging and prod')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--repo <owner/name>', 'GitHub repository hosting the workflows')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    initializeLogging(opts.verbose ? { level: LogLevel.DEBUG } : {});
  });

  registerPromoteCommands(program);
  registerInspectionCommands(program);
  registerConfigCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Pick a commit interactively and promote it to staging')}
  $ promote-cli promote staging

  ${chalk.gray('# Promote a specific commit to production (approval required)')}
  $ promote-cli promote prod 3f9a1c2e

  ${chalk.gray('# Roll production back to the previous successful deployment')}
  $ promote-cli rollback prod

  ${chalk.gray('# Show recent staging deployments')}
  $ promote-cli history staging

${chalk.bold('Environment:')}
  GITHUB_TOKEN / GH_TOKEN   API token (required for history and dispatch)
  PROMOTE_REPO              Repository, owner/name
  LOG_LEVEL                 ERROR, WARN, INFO, DEBUG or TRACE
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
