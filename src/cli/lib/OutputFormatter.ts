/**
 * Output Formatter
 *
 * Provides consistent output formatting for CLI commands.
 * Supports both table and JSON output formats.
 */

import chalk from 'chalk';
import { describeCommit } from '../../promotion/CommitRef.js';
import { formatImageReference } from '../../promotion/ImageReferenceResolver.js';
import { requiresRemoteApproval } from '../../promotion/PromotionStateMachine.js';
import type {
  CandidateSet,
  DeploymentRecord,
  DispatchHandle,
  ImageCheck,
  PromotionDecision,
} from '../../promotion/types.js';

// =============================================================================
// Format Helpers
// =============================================================================

export function formatDate(date: string | undefined): string {
  if (!date) return '-';
  const parsed = new Date(date);
  return isNaN(parsed.getTime()) ? date : parsed.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, 'Z');
}

export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Table Formatting
// =============================================================================

interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

interface TableOptions {
  columns: TableColumn[];
  border?: boolean;
}

/**
 * Create a simple ASCII table
 */
export function createTable(data: string[][], options: TableOptions): string {
  const { columns, border = true } = options;
  const lines: string[] = [];

  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] ?? '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const h = border ? '─' : '';
  const v = border ? '│' : '';

  const renderRow = (cells: string[]): string => {
    const row = columns
      .map((col, i) => pad(cells[i] ?? '', widths[i] ?? 0, col.align))
      .map((cell) => (border ? ` ${cell} ` : cell))
      .join(border ? v : ' ');
    return border ? v + row + v : row;
  };

  if (border) {
    lines.push('┌' + widths.map((w) => h.repeat(w + 2)).join('┬') + '┐');
  }

  lines.push(renderRow(columns.map((col) => col.header)));

  if (border) {
    lines.push('├' + widths.map((w) => h.repeat(w + 2)).join('┼') + '┤');
  } else {
    lines.push(widths.map((w) => '-'.repeat(w)).join(' '));
  }

  for (const row of data) {
    lines.push(renderRow(row));
  }

  if (border) {
    lines.push('└' + widths.map((w) => h.repeat(w + 2)).join('┴') + '┘');
  }

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

/**
 * Deployment history as a table, newest first
 */
export function formatDeploymentTable(records: DeploymentRecord[]): string {
  const columns: TableColumn[] = [
    { header: 'RUN', width: 6, align: 'right' },
    { header: 'COMMIT', width: 8 },
    { header: 'OUTCOME', width: 8 },
    { header: 'CREATED', width: 20 },
    { header: 'TITLE', width: 40 },
  ];
  const rows = records.map((r) => [
    `#${r.runNumber}`,
    r.commit,
    r.outcome,
    formatDate(r.createdAt),
    truncate(r.title, 50),
  ]);
  return createTable(rows, { columns });
}

export function formatCandidateTable(set: CandidateSet): string {
  if (set.status === 'empty') {
    return chalk.yellow('No candidate commits found.');
  }
  const columns: TableColumn[] = [
    { header: '#', width: 3, align: 'right' },
    { header: 'COMMIT', width: 8 },
    { header: 'SOURCE', width: 14 },
    { header: 'LABEL', width: 40 },
  ];
  const rows = set.commits.map((c, i) => [String(i + 1), c.shortHash, c.source, truncate(c.label ?? '', 60)]);
  return createTable(rows, { columns });
}

export function formatImageCheck(check: ImageCheck): string {
  return check.status === 'verified' ? chalk.green('verified') : chalk.yellow(`unverified (${check.reason})`);
}

/**
 * Post-dispatch summary: where to watch the run and what happens next
 */
export function formatDispatchSummary(decision: PromotionDecision, handle: DispatchHandle): string[] {
  const lines = [
    chalk.green(`✔ ${decision.mode === 'emergency' ? 'Emergency rollback' : 'Promotion'} dispatched to ${decision.environment}`),
    '',
    `Workflow:        ${handle.workflow}`,
    `Commit:          ${describeCommit(decision.to)}`,
    `Monitor:         ${chalk.cyan(handle.url)}`,
    `Expected image:  ${formatImageReference(decision.image)}`,
    '',
    chalk.bold('Next steps:'),
  ];
  if (requiresRemoteApproval(decision.policy)) {
    lines.push(
      `  1. Open the "${handle.workflow}" run`,
      '  2. The workflow creates an approval issue',
      '  3. Approve the deployment in the issue',
      '  4. Monitor the deployment after approval'
    );
  } else {
    lines.push('  1. Monitor the deployment run', `  2. Verify ${decision.environment} once the run completes`);
  }
  return lines;
}

// =============================================================================
// Output Formatter Class
// =============================================================================

/**
 * Result output goes to stdout; status lines for humans go to stderr so
 * `--json` output stays parseable.
 */
export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  get isJson(): boolean {
    return this.jsonMode;
  }

  /**
   * Output data (table or JSON based on mode)
   */
  output(tableOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(tableOutput);
    }
  }

  lines(lines: string[]): void {
    if (!this.jsonMode) {
      for (const line of lines) console.log(line);
    }
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: string[]): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, ...(details ? { context: details } : {}) }));
    } else {
      for (const line of details ?? []) {
        console.error(chalk.gray(line));
      }
      console.error(chalk.red('✖') + ' ' + message);
    }
  }

  warn(message: string): void {
    if (this.jsonMode) {
      console.error(formatJson({ warning: message }));
    } else {
      console.error(chalk.yellow('⚠') + ' ' + message);
    }
  }

  info(message: string): void {
    if (!this.jsonMode) {
      console.log(chalk.blue('ℹ') + ' ' + message);
    }
  }
}

export default OutputFormatter;
