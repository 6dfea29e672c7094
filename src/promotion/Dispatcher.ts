/**
 * Dispatcher
 *
 * Turns an approved decision into exactly one workflow dispatch. It never
 * retries (a duplicated deploy is worse than a failed one) and never waits
 * for the run to finish; the CI system owns completion.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { CiExecutionSystem } from '../providers/types.js';
import { ExecutorUnavailableError } from './errors.js';
import type { DispatchHandle, DispatchMethod, Environment, ResolvedCommit } from './types.js';
import { lookupWorkflow } from './workflows.js';
import type { WorkflowTable } from './workflows.js';

export interface DispatcherOptions {
  /** Wait before looking up the new run's URL; the run takes a moment to appear */
  runUrlDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class Dispatcher {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly ci: CiExecutionSystem,
    private readonly workflows: WorkflowTable,
    private readonly options: DispatcherOptions
  ) {
    this.logger = getLogger('dispatcher');
    this.sleep = options.sleep ?? defaultSleep;
  }

  async dispatch(environment: Environment, commit: ResolvedCommit, method: DispatchMethod): Promise<DispatchHandle> {
    const target = lookupWorkflow(this.workflows, environment, method);
    const inputs: Record<string, string> = { ...target.inputs, commit_sha: commit.hash };

    this.logger.info(`Dispatching "${target.workflow}"`, { environment, method, commit: commit.hash });

    try {
      await this.ci.dispatch(target.workflow, inputs);
    } catch (err) {
      if (err instanceof ExecutorUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExecutorUnavailableError(`Dispatch of '${target.workflow}' failed: ${reason}`);
    }
    const dispatchedAt = new Date().toISOString();

    return {
      workflow: target.workflow,
      inputs,
      url: await this.monitoringUrl(target.workflow),
      dispatchedAt,
    };
  }

  /**
   * One lookup of the new run's URL. The dispatch already happened, so a
   * failure here only degrades the link to the workflow page.
   */
  private async monitoringUrl(workflow: string): Promise<string> {
    if (this.options.runUrlDelayMs > 0) {
      await this.sleep(this.options.runUrlDelayMs);
    }
    try {
      const url = await this.ci.latestDispatchUrl(workflow);
      if (url) return url;
    } catch (err) {
      this.logger.warn('Could not look up the dispatched run', {
        workflow,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    return this.ci.workflowPageUrl(workflow);
  }
}
