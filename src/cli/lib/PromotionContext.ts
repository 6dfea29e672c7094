/**
 * Promotion Context
 *
 * Wires one invocation's components from the frozen configuration. Commands
 * build a context, use it, and let it go; nothing is shared between runs.
 */

import { loadPromotionConfig } from '../../config/PromotionConfig.js';
import type { PromotionConfig } from '../../config/PromotionConfig.js';
import { CommitResolver } from '../../promotion/CommitResolver.js';
import { CommitSelector } from '../../promotion/CommitSelector.js';
import { DeploymentHistoryReader } from '../../promotion/DeploymentHistoryReader.js';
import { Dispatcher } from '../../promotion/Dispatcher.js';
import { describeContext, InvalidConfigurationError, isPromotionError } from '../../promotion/errors.js';
import { ImageReferenceResolver } from '../../promotion/ImageReferenceResolver.js';
import { PromotionOrchestrator } from '../../promotion/PromotionOrchestrator.js';
import { PromotionStateMachine } from '../../promotion/PromotionStateMachine.js';
import { ReferenceSourceAggregator } from '../../promotion/ReferenceSourceAggregator.js';
import { SafetyGate } from '../../promotion/SafetyGate.js';
import type { Prompter } from '../../promotion/SafetyGate.js';
import { GitClient } from '../../providers/GitClient.js';
import { GitHubClient } from '../../providers/GitHubClient.js';
import { RegistryClient } from '../../providers/RegistryClient.js';
import type { GlobalOptions } from '../types/index.js';
import { ConfigManager } from './ConfigManager.js';
import type { OutputFormatter } from './OutputFormatter.js';

export interface PromotionContext {
  config: Readonly<PromotionConfig>;
  git: GitClient;
  github: GitHubClient;
  registry: RegistryClient;
  aggregator: ReferenceSourceAggregator;
  resolver: CommitResolver;
  history: DeploymentHistoryReader;
  images: ImageReferenceResolver;
  stateMachine: PromotionStateMachine;
  orchestrator: PromotionOrchestrator;
}

/**
 * Effective configuration: --repo > environment > stored preferences > defaults
 */
export function loadConfig(globalOpts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Readonly<PromotionConfig> {
  const effectiveEnv = globalOpts.repo ? { ...env, PROMOTE_REPO: globalOpts.repo } : env;
  return loadPromotionConfig(effectiveEnv, ConfigManager.getAll());
}

/**
 * Every GitHub call needs a token; fail before prompting rather than after.
 */
export function requireToken(config: Readonly<PromotionConfig>): void {
  if (!config.token) {
    throw new InvalidConfigurationError('GitHub token not found: set GITHUB_TOKEN or GH_TOKEN');
  }
}

export function createPromotionContext(
  config: Readonly<PromotionConfig>,
  prompter: Prompter,
  options: { cwd?: string; verbose?: boolean } = {}
): PromotionContext {
  const git = new GitClient(options.cwd ?? process.cwd());
  const github = new GitHubClient({
    repository: config.repository,
    apiUrl: config.apiUrl,
    timeoutMs: config.httpTimeoutMs,
    dispatchRef: config.dispatchRef,
    ...(config.token ? { token: config.token } : {}),
    ...(options.verbose ? { verbose: true } : {}),
  });
  const registry = new RegistryClient({
    timeoutMs: config.httpTimeoutMs,
    ...(config.registry.username ? { username: config.registry.username } : {}),
    ...(config.registry.token ? { token: config.registry.token } : {}),
  });

  const aggregator = new ReferenceSourceAggregator(git, github, { trunkBranch: config.trunkBranch });
  const resolver = new CommitResolver(git, aggregator);
  const history = new DeploymentHistoryReader(github);
  const images = new ImageReferenceResolver(
    { registry: config.registry.host, repository: config.registry.repository },
    registry
  );
  const stateMachine = new PromotionStateMachine(config.workflows);
  const selector = new CommitSelector(aggregator, resolver, prompter, {
    limit: config.candidateLimit,
    maxAttempts: config.maxSelectionAttempts,
  });
  const dispatcher = new Dispatcher(github, config.workflows, { runUrlDelayMs: config.runUrlDelayMs });

  const orchestrator = new PromotionOrchestrator(
    {
      resolver,
      selector,
      history,
      images,
      stateMachine,
      gate: new SafetyGate(prompter),
      dispatcher,
    },
    { historyWorkflows: config.historyWorkflows, historyQueryLimit: config.historyQueryLimit }
  );

  return { config, git, github, registry, aggregator, resolver, history, images, stateMachine, orchestrator };
}

/**
 * Print what was being attempted, then the error. Exit code 1.
 */
export function reportError(formatter: OutputFormatter, error: unknown, fallback: string): void {
  if (isPromotionError(error)) {
    const details = [
      ...(error.context ? describeContext(error.context) : []),
      ...(error instanceof InvalidConfigurationError ? error.issues.slice(1).map((issue) => `  ${issue}`) : []),
    ];
    formatter.error(`${error.kind}: ${error.message}`, details.length > 0 ? details : undefined);
  } else {
    formatter.error(`${fallback}: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}
