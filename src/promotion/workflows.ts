/**
 * Workflow lookup table: (environment, method) -> workflow.
 *
 * The table is a nested Record over both unions, so adding an environment or
 * a dispatch method fails to compile until every cell is filled in.
 */

import { DISPATCH_METHODS, ENVIRONMENTS } from './types.js';
import type { DispatchMethod, Environment, WorkflowTarget } from './types.js';

export type WorkflowTable = Record<Environment, Record<DispatchMethod, WorkflowTarget>>;

/** Workflow-name overrides as stored in the CLI preferences */
export type WorkflowNameOverrides = Partial<Record<Environment, Partial<Record<DispatchMethod, string>>>>;

export const PROMOTE_IMAGE_WORKFLOW = 'CD • Promote Image (No Rebuild)';
export const PROD_APPROVAL_WORKFLOW = 'CD • Production (manual approval)';

export const DEFAULT_WORKFLOW_TABLE: WorkflowTable = {
  dev: {
    'full-pipeline': {
      workflow: 'CI • Build Once & Deploy Dev',
      inputs: {},
      enforcesApproval: false,
      requiresExistingImage: false,
    },
    're-tag-promote': {
      workflow: PROMOTE_IMAGE_WORKFLOW,
      inputs: { to_env: 'dev' },
      enforcesApproval: false,
      requiresExistingImage: true,
    },
  },
  staging: {
    'full-pipeline': {
      workflow: 'CD • Auto Promote & Deploy Staging (on main)',
      inputs: {},
      enforcesApproval: false,
      requiresExistingImage: true,
    },
    're-tag-promote': {
      workflow: PROMOTE_IMAGE_WORKFLOW,
      inputs: { to_env: 'staging' },
      enforcesApproval: false,
      requiresExistingImage: true,
    },
  },
  prod: {
    // Both methods go through the approval workflow: it opens the approval
    // issue and re-tags the existing image once a human approves.
    'full-pipeline': {
      workflow: PROD_APPROVAL_WORKFLOW,
      inputs: {},
      enforcesApproval: true,
      requiresExistingImage: true,
    },
    're-tag-promote': {
      workflow: PROD_APPROVAL_WORKFLOW,
      inputs: {},
      enforcesApproval: true,
      requiresExistingImage: true,
    },
  },
};

/** Workflows whose successful runs count as deployments of each environment */
export const DEFAULT_HISTORY_WORKFLOWS: Record<Environment, string[]> = {
  dev: ['CI • Build Once & Deploy Dev'],
  staging: ['CD • Auto Promote & Deploy Staging (on main)'],
  prod: [PROD_APPROVAL_WORKFLOW],
};

/**
 * Apply workflow-name overrides to the default table. Only names change;
 * approval enforcement and image requirements stay with the cell.
 */
export function buildWorkflowTable(overrides: WorkflowNameOverrides = {}): WorkflowTable {
  const table: WorkflowTable = {
    dev: { ...DEFAULT_WORKFLOW_TABLE.dev },
    staging: { ...DEFAULT_WORKFLOW_TABLE.staging },
    prod: { ...DEFAULT_WORKFLOW_TABLE.prod },
  };

  for (const env of ENVIRONMENTS) {
    const envOverrides = overrides[env];
    if (!envOverrides) continue;
    for (const method of DISPATCH_METHODS) {
      const name = envOverrides[method];
      if (name) {
        table[env][method] = { ...table[env][method], workflow: name };
      }
    }
  }

  return table;
}

export function lookupWorkflow(
  table: WorkflowTable,
  environment: Environment,
  method: DispatchMethod
): WorkflowTarget {
  return table[environment][method];
}
