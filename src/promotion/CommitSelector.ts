/**
 * Commit Selector
 *
 * Interactive choice of a commit when the operator did not name one:
 *
 *   1) 3f9a1c2e - Fix health probe timeout
 *   2) 77b01d4a - Release: v1.4.0
 *   0) Use current commit (9c0e4f11)
 *   99) Enter commit hash manually
 *
 * Invalid input re-prompts at most `maxAttempts` times, then the selection
 * is declined. Closed input declines immediately.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { CommitResolver } from './CommitResolver.js';
import { AmbiguousRefError, NotFoundError } from './errors.js';
import type { ReferenceSourceAggregator } from './ReferenceSourceAggregator.js';
import type { Prompter } from './SafetyGate.js';
import type { CandidateSet, ResolvedCommit } from './types.js';

export const CURRENT_OPTION = 0;
export const MANUAL_OPTION = 99;

export type SelectionResult =
  | { status: 'selected'; commit: ResolvedCommit }
  | { status: 'declined'; reason: string };

export interface CommitSelectorOptions {
  limit: number;
  maxAttempts: number;
}

export function formatCandidateMenu(set: CandidateSet, current: ResolvedCommit): string[] {
  const lines: string[] = [];
  if (set.status === 'ok') {
    lines.push('Available commits (most recent first):', '');
    set.commits.forEach((commit, index) => {
      lines.push(commit.label ? `${index + 1}) ${commit.shortHash} - ${commit.label}` : `${index + 1}) ${commit.shortHash}`);
    });
  } else {
    lines.push('Could not find recent commits.');
  }
  for (const partial of set.partial) {
    lines.push(`   ${partial.id}${partial.label ? ` - ${partial.label}` : ''} (unresolved, not selectable)`);
  }
  lines.push('', `${CURRENT_OPTION}) Use current commit (${current.shortHash})`, `${MANUAL_OPTION}) Enter commit hash manually`, '');
  return lines;
}

export class CommitSelector {
  private readonly logger: Logger;

  constructor(
    private readonly aggregator: ReferenceSourceAggregator,
    private readonly resolver: CommitResolver,
    private readonly prompter: Prompter,
    private readonly options: CommitSelectorOptions
  ) {
    this.logger = getLogger('commit-selector');
  }

  async select(): Promise<SelectionResult> {
    const set = await this.aggregator.candidates(this.options.limit);
    const current = await this.resolver.resolve('current');
    const commits = set.status === 'ok' ? set.commits : [];

    if (set.failedSources.length > 0) {
      this.prompter.write(`Some commit sources were unavailable: ${set.failedSources.join(', ')}`);
    }
    for (const line of formatCandidateMenu(set, current)) {
      this.prompter.write(line);
    }

    const question =
      commits.length > 0
        ? `Select commit (0-${commits.length}, or ${MANUAL_OPTION} for manual): `
        : `Select option (${CURRENT_OPTION} or ${MANUAL_OPTION}): `;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const answer = await this.prompter.ask(question);
      if (answer === null) {
        return { status: 'declined', reason: 'input closed during commit selection' };
      }

      const trimmed = answer.trim();
      if (!/^\d+$/.test(trimmed)) {
        this.prompter.write('ERROR: Please enter a number.');
        continue;
      }

      const choice = parseInt(trimmed, 10);
      if (choice === CURRENT_OPTION) {
        this.logger.debug('Selected current commit', { hash: current.hash });
        return { status: 'selected', commit: current };
      }
      if (choice === MANUAL_OPTION) {
        return this.manualEntry();
      }
      const picked = commits[choice - 1];
      if (choice >= 1 && picked) {
        return { status: 'selected', commit: picked };
      }
      this.prompter.write(
        commits.length > 0
          ? `ERROR: Invalid selection. Please choose 0-${commits.length} or ${MANUAL_OPTION}`
          : `ERROR: Invalid selection. Please choose ${CURRENT_OPTION} or ${MANUAL_OPTION}`
      );
    }

    return { status: 'declined', reason: `no valid selection after ${this.options.maxAttempts} attempts` };
  }

  private async manualEntry(): Promise<SelectionResult> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const answer = await this.prompter.ask('Enter commit hash (full or short): ');
      if (answer === null) {
        return { status: 'declined', reason: 'input closed during manual entry' };
      }
      const token = answer.trim();
      if (!token) {
        this.prompter.write('ERROR: Please enter a commit hash.');
        continue;
      }
      try {
        const commit = await this.resolver.resolve(token, 'manual');
        return { status: 'selected', commit };
      } catch (err) {
        if (err instanceof AmbiguousRefError || err instanceof NotFoundError) {
          this.prompter.write(`ERROR: ${err.message}. Please try again.`);
          continue;
        }
        throw err;
      }
    }
    return { status: 'declined', reason: `no valid commit entered after ${this.options.maxAttempts} attempts` };
  }
}
