/**
 * Release promotion core
 *
 * Resolves commits, reads deployment history, derives images, decides the
 * approval policy and workflow, runs the confirmation gate and dispatches.
 */

export * from './types.js';
export * from './errors.js';
export * from './CommitRef.js';
export { CommitResolver } from './CommitResolver.js';
export type { TagResolver } from './CommitResolver.js';
export { ReferenceSourceAggregator, mergeCandidates, releaseLabel } from './ReferenceSourceAggregator.js';
export type { AggregatorOptions, CandidateSource, SourceRecord } from './ReferenceSourceAggregator.js';
export { DeploymentHistoryReader, toDeploymentRecord } from './DeploymentHistoryReader.js';
export { ImageReferenceResolver, formatImageReference, imageTag, IMAGE_TAG_PREFIX } from './ImageReferenceResolver.js';
export type { ImageCoordinates } from './ImageReferenceResolver.js';
export {
  PromotionStateMachine,
  approvalPolicy,
  approvalTiers,
  requiresRemoteApproval,
  CONFIRM_TOKENS,
  PROD_PHRASES,
} from './PromotionStateMachine.js';
export type { DecisionInput, PromotionRequest } from './PromotionStateMachine.js';
export { SafetyGate, gateSteps, summarizeDecision } from './SafetyGate.js';
export type { GateResult, GateStep, Prompter } from './SafetyGate.js';
export { Dispatcher } from './Dispatcher.js';
export type { DispatcherOptions } from './Dispatcher.js';
export { CommitSelector, formatCandidateMenu, CURRENT_OPTION, MANUAL_OPTION } from './CommitSelector.js';
export type { CommitSelectorOptions, SelectionResult } from './CommitSelector.js';
export { PromotionOrchestrator, ROLLBACK_MIN_HISTORY } from './PromotionOrchestrator.js';
export type { OrchestratorComponents, OrchestratorSettings, PromoteRequest } from './PromotionOrchestrator.js';
export {
  DEFAULT_WORKFLOW_TABLE,
  DEFAULT_HISTORY_WORKFLOWS,
  buildWorkflowTable,
  lookupWorkflow,
} from './workflows.js';
export type { WorkflowNameOverrides, WorkflowTable } from './workflows.js';
