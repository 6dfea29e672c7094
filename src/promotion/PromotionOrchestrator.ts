/**
 * Promotion Orchestrator
 *
 * The single entry point: promote(environment, commitRef?, mode).
 *
 *   resolve commit ─▶ derive + verify image ─▶ decide (policy, workflow)
 *        │                                          │
 *   (select when absent,                      safety gate ─▶ dispatch once
 *    or previous deployment
 *    for emergency rollback)
 *
 * Errors leave with the decision context attached so the caller can print
 * what was being attempted before the error itself.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { toResolvedCommit } from './CommitRef.js';
import type { CommitResolver } from './CommitResolver.js';
import type { CommitSelector } from './CommitSelector.js';
import type { DeploymentHistoryReader } from './DeploymentHistoryReader.js';
import type { Dispatcher } from './Dispatcher.js';
import { InsufficientHistoryError, PromotionError } from './errors.js';
import type { DecisionContext } from './errors.js';
import { formatImageReference } from './ImageReferenceResolver.js';
import type { ImageReferenceResolver } from './ImageReferenceResolver.js';
import type { PromotionStateMachine } from './PromotionStateMachine.js';
import type { SafetyGate } from './SafetyGate.js';
import type {
  DeploymentRecord,
  DispatchMethod,
  Environment,
  ImageCheck,
  PromotionMode,
  PromotionOutcome,
  ResolvedCommit,
} from './types.js';

export interface PromoteRequest {
  environment: Environment;
  commitRef?: string;
  mode: PromotionMode;
  method?: DispatchMethod;
}

export interface OrchestratorComponents {
  resolver: CommitResolver;
  selector: CommitSelector;
  history: DeploymentHistoryReader;
  images: ImageReferenceResolver;
  stateMachine: PromotionStateMachine;
  gate: SafetyGate;
  dispatcher: Dispatcher;
}

export interface OrchestratorSettings {
  historyWorkflows: Record<Environment, string[]>;
  historyQueryLimit: number;
}

/** Current and previous deployment, the minimum a rollback needs */
export const ROLLBACK_MIN_HISTORY = 2;

export class PromotionOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly components: OrchestratorComponents,
    private readonly settings: OrchestratorSettings
  ) {
    this.logger = getLogger('orchestrator');
  }

  /**
   * Emergency rollback to the previous successful deployment.
   */
  rollback(environment: Environment): Promise<PromotionOutcome> {
    return this.promote({ environment, mode: 'emergency' });
  }

  async promote(request: PromoteRequest): Promise<PromotionOutcome> {
    const { environment, mode } = request;
    const method: DispatchMethod = request.method ?? 're-tag-promote';
    const context: DecisionContext = {
      action: mode === 'emergency' ? `emergency rollback of ${environment}` : `promotion to ${environment}`,
      environment,
      mode,
      ...(request.commitRef ? { commit: request.commitRef } : {}),
    };

    try {
      let to: ResolvedCommit;
      let from: DeploymentRecord | undefined;

      if (mode === 'emergency' && !request.commitRef) {
        const [current, previous] = await this.rollbackPair(environment);
        from = current;
        to = toResolvedCommit(previous.headSha, 'deployment-history', previous.title);
      } else {
        if (request.commitRef) {
          to = await this.components.resolver.resolve(request.commitRef);
        } else {
          const selection = await this.components.selector.select();
          if (selection.status === 'declined') {
            this.logger.info('Commit selection declined', { environment, reason: selection.reason });
            return { status: 'declined', reason: selection.reason };
          }
          to = selection.commit;
        }
        from = await this.currentDeployment(environment, mode);
      }
      context.commit = to.hash;

      const image = this.components.images.resolve(to);
      context.image = formatImageReference(image);

      const imageCheck: ImageCheck = this.components.stateMachine.requiresExistingImage(environment, method)
        ? await this.components.images.validate(environment, image)
        : { status: 'unverified', reason: 'the workflow builds the image' };

      const decision = this.components.stateMachine.decide({
        environment,
        mode,
        method,
        to,
        ...(from ? { from } : {}),
        image,
        imageCheck,
      });

      const gate = await this.components.gate.confirm(decision);
      if (!gate.approved) {
        this.logger.info('Promotion declined at the safety gate', { environment, step: gate.step });
        return { status: 'declined', decision, reason: gate.reason };
      }

      const handle = await this.components.dispatcher.dispatch(environment, to, method);
      this.logger.info('Promotion dispatched', { environment, commit: to.hash, workflow: handle.workflow });
      return { status: 'dispatched', decision, handle };
    } catch (err) {
      if (err instanceof PromotionError) {
        throw err.withContext(context);
      }
      throw err;
    }
  }

  private async rollbackPair(environment: Environment): Promise<[DeploymentRecord, DeploymentRecord]> {
    const records = await this.components.history.history(
      environment,
      this.settings.historyWorkflows[environment],
      ROLLBACK_MIN_HISTORY,
      this.settings.historyQueryLimit
    );
    const [current] = records;
    // Re-runs of the current commit are not a rollback target
    const previous = records.find((record) => current && record.headSha !== current.headSha);
    if (!current || !previous) {
      const distinct = new Set(records.map((record) => record.headSha)).size;
      throw new InsufficientHistoryError(environment, ROLLBACK_MIN_HISTORY, distinct);
    }
    return [current, previous];
  }

  /**
   * The deployment being replaced. Required for an emergency promotion to a
   * named commit; informational otherwise.
   */
  private async currentDeployment(environment: Environment, mode: PromotionMode): Promise<DeploymentRecord | undefined> {
    const workflows = this.settings.historyWorkflows[environment];
    if (mode === 'emergency') {
      const [current] = await this.components.history.history(environment, workflows, 1, this.settings.historyQueryLimit);
      return current;
    }
    try {
      const [current] = await this.components.history.history(environment, workflows, 1, this.settings.historyQueryLimit);
      return current;
    } catch (err) {
      if (!(err instanceof PromotionError)) throw err;
      this.logger.warn(`Current ${environment} deployment unknown`, { reason: err.message });
      return undefined;
    }
  }
}
