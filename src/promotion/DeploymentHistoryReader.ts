/**
 * Deployment History Reader
 *
 * Reads prior successful deployments of an environment from the CI system.
 * An environment may have been served by several workflows over time; they
 * are queried in order until enough records are found. Records keep the
 * order the CI system delivers (newest first per workflow) and are never
 * re-sorted across workflows.
 *
 * Always queried fresh: a stale answer is worse than no answer when it
 * decides what production rolls back to.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { CiExecutionSystem, WorkflowRun } from '../providers/types.js';
import { shortHash } from './CommitRef.js';
import { ExecutorUnavailableError, InsufficientHistoryError, NotFoundError } from './errors.js';
import type { DeploymentRecord, Environment } from './types.js';

export function toDeploymentRecord(run: WorkflowRun, environment: Environment, workflow: string): DeploymentRecord {
  const headSha = run.headSha.toLowerCase();
  return {
    runId: run.id,
    runNumber: run.runNumber,
    createdAt: run.createdAt,
    commit: shortHash(headSha),
    headSha,
    environment,
    outcome: run.outcome,
    title: run.title,
    workflow,
    ...(run.url ? { url: run.url } : {}),
  };
}

export class DeploymentHistoryReader {
  private readonly logger: Logger;

  constructor(private readonly ci: CiExecutionSystem) {
    this.logger = getLogger('history-reader');
  }

  /**
   * Collect at least `minCount` successful deployments of `environment`.
   * Fails with InsufficientHistoryError when the candidates are exhausted
   * first.
   */
  async history(
    environment: Environment,
    workflowCandidates: readonly string[],
    minCount: number,
    perQueryLimit: number
  ): Promise<DeploymentRecord[]> {
    const records: DeploymentRecord[] = [];

    for (const workflow of workflowCandidates) {
      if (minCount > 0 && records.length >= minCount) break;

      const runs = await this.queryWorkflow(workflow, { status: 'success', limit: perQueryLimit });
      if (!runs) continue;

      // The CI filter is trusted but re-checked: only successes are rollback targets
      for (const run of runs) {
        if (run.outcome === 'success') {
          records.push(toDeploymentRecord(run, environment, workflow));
        }
      }

      this.logger.debug('Queried deployment workflow', {
        environment,
        workflow,
        runs: runs.length,
        collected: records.length,
      });
    }

    if (records.length < minCount) {
      throw new InsufficientHistoryError(environment, minCount, records.length);
    }

    return records;
  }

  /**
   * Recent runs of every candidate workflow, any outcome, for display.
   */
  async recent(
    environment: Environment,
    workflowCandidates: readonly string[],
    limit: number
  ): Promise<DeploymentRecord[]> {
    const records: DeploymentRecord[] = [];
    for (const workflow of workflowCandidates) {
      const runs = await this.queryWorkflow(workflow, { limit });
      if (!runs) continue;
      records.push(...runs.map((run) => toDeploymentRecord(run, environment, workflow)));
    }
    return records.slice(0, limit);
  }

  /**
   * Returns null when the workflow no longer exists; other failures mean the
   * CI system cannot answer and are fatal.
   */
  private async queryWorkflow(
    workflow: string,
    options: { status?: 'success'; limit: number }
  ): Promise<WorkflowRun[] | null> {
    try {
      return await this.ci.listRuns(workflow, options);
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.warn(`Workflow not found, skipping: ${workflow}`);
        return null;
      }
      if (err instanceof ExecutorUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExecutorUnavailableError(`Could not read history of '${workflow}': ${reason}`);
    }
  }
}
