/**
 * Safety Gate
 *
 * Sequential confirmation protocol run before any dispatch:
 *   1. show the decision summary
 *   2. require the policy's confirm token, typed exactly
 *   3. for prod, require a second phrase distinct from the token
 * Any mismatch ends the sequence with a declined result. Matching is
 * case-sensitive with no default for empty input.
 */

import { formatImageReference } from './ImageReferenceResolver.js';
import { describeCommit } from './CommitRef.js';
import { InvalidConfigurationError } from './errors.js';
import { requiresRemoteApproval } from './PromotionStateMachine.js';
import type { ApprovalPolicy, PromotionDecision } from './types.js';

/**
 * Terminal I/O used by the gate and the commit selector. `ask` resolves to
 * null when input is closed (EOF, Ctrl+D).
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  write(line: string): void;
}

export type GateStep =
  | { kind: 'summary'; lines: string[] }
  | { kind: 'token'; expected: string; prompt: string }
  | { kind: 'phrase'; expected: string; prompt: string };

export type GateResult =
  | { approved: true }
  | { approved: false; step: 'token' | 'phrase'; reason: string };

export function summarizeDecision(decision: PromotionDecision): string[] {
  const from = decision.from
    ? `${decision.from.commit} (${decision.from.title}, run #${decision.from.runNumber})`
    : 'unknown';
  const imageCheck =
    decision.imageCheck.status === 'verified' ? 'verified' : `UNVERIFIED (${decision.imageCheck.reason})`;

  const lines = [
    `Environment: ${decision.environment}`,
    `Mode:        ${decision.mode}`,
    `Method:      ${decision.method} via "${decision.target.workflow}"`,
    `From:        ${from}`,
    `To:          ${describeCommit(decision.to)}`,
    `Image:       ${formatImageReference(decision.image)}`,
    `Image check: ${imageCheck}`,
    `Approval:    ${decision.policy.tiers.join(', ')}`,
  ];
  if (requiresRemoteApproval(decision.policy)) {
    lines.push('The workflow opens an approval issue; a human must approve it before it deploys.');
  }
  return lines;
}

function tokenPrompt(policy: ApprovalPolicy, token: string): string {
  if (policy.mode === 'emergency') {
    return `PROCEED WITH EMERGENCY ROLLBACK? (type '${token}' to confirm): `;
  }
  if (policy.environment === 'prod') {
    return `Type '${token}' to proceed with deployment: `;
  }
  return `Promote to ${policy.environment}? (type '${token}' to confirm): `;
}

function phrasePrompt(policy: ApprovalPolicy, phrase: string): string {
  return policy.mode === 'emergency'
    ? `Confirm production emergency rollback (type '${phrase}'): `
    : `Confirm production deployment (type '${phrase}'): `;
}

/**
 * The explicit step sequence for a decision.
 */
export function gateSteps(decision: PromotionDecision): GateStep[] {
  const { policy } = decision;
  const steps: GateStep[] = [{ kind: 'summary', lines: summarizeDecision(decision) }];

  if (policy.confirmToken) {
    steps.push({ kind: 'token', expected: policy.confirmToken, prompt: tokenPrompt(policy, policy.confirmToken) });
  }
  if (policy.secondPhrase) {
    if (policy.secondPhrase === policy.confirmToken) {
      throw new InvalidConfigurationError('The second confirmation phrase must differ from the confirm token');
    }
    steps.push({ kind: 'phrase', expected: policy.secondPhrase, prompt: phrasePrompt(policy, policy.secondPhrase) });
  }
  return steps;
}

function normalizeAnswer(answer: string): string {
  // Strip only the line terminator a terminal may leave behind
  return answer.replace(/\r?\n$/, '');
}

export class SafetyGate {
  constructor(private readonly prompter: Prompter) {}

  async confirm(decision: PromotionDecision): Promise<GateResult> {
    for (const step of gateSteps(decision)) {
      if (step.kind === 'summary') {
        for (const line of step.lines) {
          this.prompter.write(line);
        }
        continue;
      }

      const answer = await this.prompter.ask(step.prompt);
      const typed = answer === null ? null : normalizeAnswer(answer);
      if (typed !== step.expected) {
        return {
          approved: false,
          step: step.kind,
          reason:
            typed === null
              ? 'input closed before confirmation'
              : `expected '${step.expected}', got '${typed}'`,
        };
      }
    }

    return { approved: true };
  }
}
