/**
 * Promotion errors.
 *
 * Every failure carries a `kind` so callers can branch without string
 * matching, and an optional context describing what was being attempted.
 * A declined confirmation is not an error; see PromotionOutcome.
 */

import type { Environment, PromotionMode } from './types.js';

export type PromotionErrorKind =
  | 'AmbiguousRef'
  | 'NotFound'
  | 'InsufficientHistory'
  | 'RegistryUnreachable'
  | 'ExecutorUnavailable'
  | 'InvalidConfiguration';

/**
 * What the orchestrator was doing when it failed. Printed before the error
 * so the operator sees which action was blocked.
 */
export interface DecisionContext {
  action: string;
  environment?: Environment;
  mode?: PromotionMode;
  commit?: string;
  image?: string;
}

export class PromotionError extends Error {
  context?: DecisionContext;

  constructor(
    public readonly kind: PromotionErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PromotionError';
  }

  withContext(context: DecisionContext): this {
    if (!this.context) {
      this.context = context;
    }
    return this;
  }
}

export class AmbiguousRefError extends PromotionError {
  constructor(
    public readonly ref: string,
    public readonly matches: string[]
  ) {
    super('AmbiguousRef', `Commit reference '${ref}' is ambiguous: matches ${matches.length} commits`, {
      matches,
    });
    this.name = 'AmbiguousRefError';
  }
}

export class NotFoundError extends PromotionError {
  constructor(
    public readonly resource: 'commit' | 'image' | 'repository' | 'workflow',
    public readonly ref: string,
    message?: string
  ) {
    super('NotFound', message ?? `${resource} not found: ${ref}`, { resource, ref });
    this.name = 'NotFoundError';
  }
}

export class InsufficientHistoryError extends PromotionError {
  constructor(
    public readonly environment: Environment,
    public readonly required: number,
    public readonly found: number
  ) {
    super(
      'InsufficientHistory',
      `Cannot find enough deployment history for ${environment}: need ${required} successful deployments, found ${found}`,
      { required, found }
    );
    this.name = 'InsufficientHistoryError';
  }
}

export class RegistryUnreachableError extends PromotionError {
  constructor(
    public readonly image: string,
    cause?: string
  ) {
    super('RegistryUnreachable', `Registry unreachable while checking ${image}${cause ? `: ${cause}` : ''}`, {
      image,
    });
    this.name = 'RegistryUnreachableError';
  }
}

export class ExecutorUnavailableError extends PromotionError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super('ExecutorUnavailable', message, statusCode !== undefined ? { statusCode } : undefined);
    this.name = 'ExecutorUnavailableError';
  }
}

export class InvalidConfigurationError extends PromotionError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('InvalidConfiguration', message, issues.length > 0 ? { issues } : undefined);
    this.name = 'InvalidConfigurationError';
  }
}

export function isPromotionError(error: unknown): error is PromotionError {
  return error instanceof PromotionError;
}

/**
 * Render a decision context as the lines printed before an error.
 */
export function describeContext(context: DecisionContext): string[] {
  const lines = [`While attempting: ${context.action}`];
  if (context.environment) lines.push(`  Environment: ${context.environment}`);
  if (context.mode) lines.push(`  Mode:        ${context.mode}`);
  if (context.commit) lines.push(`  Commit:      ${context.commit}`);
  if (context.image) lines.push(`  Image:       ${context.image}`);
  return lines;
}
