/**
 * Pack Context
 *
 * The state one pack instance owns: queued specs, registered setups,
 * activation state and branch overrides. Callers create it and pass it to
 * every operation, so independent instances never share tables.
 */

import type { PluginSpec } from '../types/spec.js';
import { ActivationStore } from './activation-store.js';
import { SetupRegistry } from './setup-registry.js';

export interface PackContext {
  /** Specs registered since the last drain, in registration order */
  readonly queue: PluginSpec[];
  readonly setups: SetupRegistry;
  readonly activation: ActivationStore;
  /** identity → branch/tag requested in configuration */
  readonly branchOverrides: Map<string, string>;
}

export function createPackContext(): PackContext {
  return {
    queue: [],
    setups: new SetupRegistry(),
    activation: new ActivationStore(),
    branchOverrides: new Map(),
  };
}
