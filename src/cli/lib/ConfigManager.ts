/**
 * Configuration Manager
 *
 * Persists CLI preferences with the 'conf' package. Only preferences live
 * here; tokens come from the environment and are never written to disk.
 *
 * The config file is stored at:
 * - macOS: ~/Library/Preferences/promote-cli-nodejs/config.json
 * - Windows: %APPDATA%/promote-cli-nodejs/Config/config.json
 * - Linux: ~/.config/promote-cli-nodejs/config.json
 */

import Conf from 'conf';
import type { StoredPreferences } from '../../config/PromotionConfig.js';
import type { DispatchMethod, Environment } from '../../promotion/types.js';

let store: Conf<StoredPreferences> | null = null;

function getStore(): Conf<StoredPreferences> {
  if (!store) {
    store = new Conf<StoredPreferences>({
      projectName: 'promote-cli',
      // PROMOTE_CONFIG_DIR lets tests and CI keep preferences out of the home directory
      ...(process.env['PROMOTE_CONFIG_DIR'] ? { cwd: process.env['PROMOTE_CONFIG_DIR'] } : {}),
    });
  }
  return store;
}

/**
 * ConfigManager provides typed access to stored preferences
 */
export const ConfigManager = {
  getAll(): StoredPreferences {
    return getStore().store;
  },

  get<K extends keyof StoredPreferences>(key: K): StoredPreferences[K] {
    return getStore().get(key);
  },

  set<K extends keyof StoredPreferences>(key: K, value: StoredPreferences[K]): void {
    getStore().set(key, value);
  },

  /**
   * Delete a preference (fall back to the default)
   */
  delete<K extends keyof StoredPreferences>(key: K): void {
    getStore().delete(key);
  },

  reset(): void {
    getStore().clear();
  },

  getPath(): string {
    return getStore().path;
  },

  // ==========================================================================
  // Workflow helpers
  // ==========================================================================

  /**
   * Override the workflow dispatched for one environment/method cell
   */
  setWorkflow(environment: Environment, method: DispatchMethod, workflow: string): void {
    const workflows = { ...(getStore().get('workflows') ?? {}) };
    const cell = { ...(workflows[environment] ?? {}) };
    cell[method] = workflow;
    workflows[environment] = cell;
    getStore().set('workflows', workflows);
  },

  /**
   * Replace the workflows read for an environment's deployment history
   */
  setHistoryWorkflows(environment: Environment, workflows: string[]): void {
    const current = { ...(getStore().get('historyWorkflows') ?? {}) };
    current[environment] = workflows;
    getStore().set('historyWorkflows', current);
  },
};

export default ConfigManager;
