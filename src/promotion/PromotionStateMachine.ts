/**
 * Promotion State Machine
 *
 * States are the environments. Any commit whose image exists may move to any
 * environment; there is no hard-coded dev -> staging -> prod chain. What the
 * machine does enforce is the approval policy for each (target, mode) pair:
 *
 *   dev      any        none
 *   staging  normal     interactive-confirm                          "yes"
 *   staging  emergency  interactive-confirm (reduced)                "ROLLBACK"
 *   prod     normal     confirm + typed phrase, remote approval      "approved" / "PROD-DEPLOY"
 *   prod     emergency  confirm + typed phrase, remote approval      "ROLLBACK" / "PROD-EMERGENCY"
 *
 * Prod always carries remote-approval-gate. Emergency only changes which
 * workflow performs the re-tag, never whether a human approves it.
 */

import { InvalidConfigurationError } from './errors.js';
import { isDispatchMethod, isEnvironment } from './types.js';
import type {
  ApprovalPolicy,
  ApprovalTier,
  DeploymentRecord,
  DispatchMethod,
  Environment,
  ImageCheck,
  ImageReference,
  PromotionDecision,
  PromotionMode,
  ResolvedCommit,
} from './types.js';
import { lookupWorkflow } from './workflows.js';
import type { WorkflowTable } from './workflows.js';

export const CONFIRM_TOKENS = {
  staging: 'yes',
  emergency: 'ROLLBACK',
  prodManual: 'approved',
} as const;

export const PROD_PHRASES = {
  normal: 'PROD-DEPLOY',
  emergency: 'PROD-EMERGENCY',
} as const;

export function approvalPolicy(environment: Environment, mode: PromotionMode): ApprovalPolicy {
  switch (environment) {
    case 'dev':
      return { environment, mode, tiers: ['none'], reduced: false };

    case 'staging':
      return mode === 'emergency'
        ? {
            environment,
            mode,
            tiers: ['interactive-confirm'],
            confirmToken: CONFIRM_TOKENS.emergency,
            reduced: true,
          }
        : {
            environment,
            mode,
            tiers: ['interactive-confirm'],
            confirmToken: CONFIRM_TOKENS.staging,
            reduced: false,
          };

    case 'prod':
      return {
        environment,
        mode,
        tiers: ['interactive-confirm+typed-phrase', 'remote-approval-gate'],
        confirmToken: mode === 'emergency' ? CONFIRM_TOKENS.emergency : CONFIRM_TOKENS.prodManual,
        secondPhrase: mode === 'emergency' ? PROD_PHRASES.emergency : PROD_PHRASES.normal,
        reduced: false,
      };
  }
}

export function approvalTiers(environment: Environment, mode: PromotionMode): ApprovalTier[] {
  return approvalPolicy(environment, mode).tiers;
}

export function requiresRemoteApproval(policy: ApprovalPolicy): boolean {
  return policy.tiers.includes('remote-approval-gate');
}

export interface PromotionRequest {
  environment: string;
  mode: PromotionMode;
  method: string;
}

export interface DecisionInput {
  environment: Environment;
  mode: PromotionMode;
  method: DispatchMethod;
  to: ResolvedCommit;
  from?: DeploymentRecord;
  image: ImageReference;
  imageCheck: ImageCheck;
}

export class PromotionStateMachine {
  constructor(private readonly workflows: WorkflowTable) {}

  /**
   * Validate the shape of a request before any I/O happens.
   */
  validate(request: PromotionRequest): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!isEnvironment(request.environment)) {
      errors.push(`Unknown environment: '${request.environment}' (expected dev, staging or prod)`);
    }
    if (!isDispatchMethod(request.method)) {
      errors.push(`Unknown method: '${request.method}' (expected full-pipeline or re-tag-promote)`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Build the decision value the gate and dispatcher act on. Refuses to pair a
   * policy that needs remote approval with a workflow that does not enforce it.
   */
  decide(input: DecisionInput): PromotionDecision {
    const policy = approvalPolicy(input.environment, input.mode);
    const target = lookupWorkflow(this.workflows, input.environment, input.method);

    if (requiresRemoteApproval(policy) && !target.enforcesApproval) {
      throw new InvalidConfigurationError(
        `Workflow '${target.workflow}' does not enforce remote approval, which ${input.environment} requires`
      );
    }
    if (input.environment === 'prod' && input.imageCheck.status !== 'verified') {
      throw new InvalidConfigurationError('Production promotion requires a verified image');
    }

    return {
      environment: input.environment,
      mode: input.mode,
      method: input.method,
      ...(input.from ? { from: input.from } : {}),
      to: input.to,
      image: input.image,
      imageCheck: input.imageCheck,
      policy,
      target,
    };
  }

  /**
   * Whether the selected workflow needs the image to exist already.
   */
  requiresExistingImage(environment: Environment, method: DispatchMethod): boolean {
    return lookupWorkflow(this.workflows, environment, method).requiresExistingImage;
  }
}
