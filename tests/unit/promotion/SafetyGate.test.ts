import { describe, it, expect } from '@jest/globals';
import { toResolvedCommit } from '../../../src/promotion/CommitRef.js';
import { PromotionStateMachine } from '../../../src/promotion/PromotionStateMachine.js';
import { SafetyGate, gateSteps, summarizeDecision } from '../../../src/promotion/SafetyGate.js';
import type { Environment, PromotionDecision, PromotionMode } from '../../../src/promotion/types.js';
import { DEFAULT_WORKFLOW_TABLE } from '../../../src/promotion/workflows.js';
import { ScriptedPrompter, fakeHash } from '../../helpers/fakes.js';

function decision(environment: Environment, mode: PromotionMode): PromotionDecision {
  return new PromotionStateMachine(DEFAULT_WORKFLOW_TABLE).decide({
    environment,
    mode,
    method: 're-tag-promote',
    to: toResolvedCommit(fakeHash(0x3f9a), 'manual', 'Fix probe'),
    image: { registry: 'ghcr.io', repository: 'acme/web', tag: 'sha-3f9a0000' },
    imageCheck: { status: 'verified' },
  });
}

describe('SafetyGate', () => {
  describe('confirm', () => {
    it('should reject lower-case rollback for an emergency', async () => {
      const prompter = new ScriptedPrompter(['rollback']);
      const result = await new SafetyGate(prompter).confirm(decision('staging', 'emergency'));

      expect(result).toEqual({ approved: false, step: 'token', reason: "expected 'ROLLBACK', got 'rollback'" });
    });

    it('should accept ROLLBACK typed exactly', async () => {
      const prompter = new ScriptedPrompter(['ROLLBACK']);
      const result = await new SafetyGate(prompter).confirm(decision('staging', 'emergency'));

      expect(result).toEqual({ approved: true });
      expect(prompter.questions).toEqual(["PROCEED WITH EMERGENCY ROLLBACK? (type 'ROLLBACK' to confirm): "]);
    });

    it('should pass dev without prompting', async () => {
      const prompter = new ScriptedPrompter([]);
      const result = await new SafetyGate(prompter).confirm(decision('dev', 'normal'));

      expect(result).toEqual({ approved: true });
      expect(prompter.questions).toEqual([]);
      expect(prompter.output[0]).toBe('Environment: dev');
    });

    it('should require both the token and the phrase for prod', async () => {
      const prompter = new ScriptedPrompter(['approved', 'PROD-DEPLOY']);
      const result = await new SafetyGate(prompter).confirm(decision('prod', 'normal'));

      expect(result).toEqual({ approved: true });
      expect(prompter.questions).toEqual([
        "Type 'approved' to proceed with deployment: ",
        "Confirm production deployment (type 'PROD-DEPLOY'): ",
      ]);
    });

    it('should stop at the phrase when it does not match', async () => {
      const prompter = new ScriptedPrompter(['ROLLBACK', 'ROLLBACK']);
      const result = await new SafetyGate(prompter).confirm(decision('prod', 'emergency'));

      expect(result).toEqual({
        approved: false,
        step: 'phrase',
        reason: "expected 'PROD-EMERGENCY', got 'ROLLBACK'",
      });
    });

    it('should not accept an empty answer or trim spaces', async () => {
      expect(await new SafetyGate(new ScriptedPrompter([''])).confirm(decision('staging', 'normal'))).toMatchObject({
        approved: false,
      });
      expect(
        await new SafetyGate(new ScriptedPrompter([' yes'])).confirm(decision('staging', 'normal'))
      ).toMatchObject({ approved: false });
    });

    it('should strip only a trailing newline', async () => {
      const result = await new SafetyGate(new ScriptedPrompter(['yes\r\n'])).confirm(decision('staging', 'normal'));
      expect(result).toEqual({ approved: true });
    });

    it('should decline when input closes', async () => {
      const result = await new SafetyGate(new ScriptedPrompter([null])).confirm(decision('staging', 'normal'));
      expect(result).toEqual({ approved: false, step: 'token', reason: 'input closed before confirmation' });
    });
  });

  describe('gateSteps', () => {
    it('should produce summary, token and phrase for prod', () => {
      expect(gateSteps(decision('prod', 'emergency')).map((s) => s.kind)).toEqual(['summary', 'token', 'phrase']);
    });

    it('should refuse a phrase equal to the token', () => {
      const d = decision('prod', 'normal');
      const broken: PromotionDecision = { ...d, policy: { ...d.policy, secondPhrase: 'approved' } };
      expect(() => gateSteps(broken)).toThrow('The second confirmation phrase must differ from the confirm token');
    });
  });

  describe('summarizeDecision', () => {
    it('should describe the promotion', () => {
      expect(summarizeDecision(decision('staging', 'normal'))).toEqual([
        'Environment: staging',
        'Mode:        normal',
        'Method:      re-tag-promote via "CD • Promote Image (No Rebuild)"',
        'From:        unknown',
        'To:          3f9a0000 (Fix probe)',
        'Image:       ghcr.io/acme/web:sha-3f9a0000',
        'Image check: verified',
        'Approval:    interactive-confirm',
      ]);
    });

    it('should mention the approval issue for prod', () => {
      const lines = summarizeDecision(decision('prod', 'normal'));
      expect(lines[lines.length - 1]).toBe(
        'The workflow opens an approval issue; a human must approve it before it deploys.'
      );
    });
  });
});
