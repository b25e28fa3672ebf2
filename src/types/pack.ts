import type { SetupAction } from './spec.js';

/**
 * Canonical install unit produced by spec normalization. Frozen.
 */
export interface PluginDescriptor {
  /** Absolute fetch URL */
  readonly source: string;
  /** Branch, tag or version to track */
  readonly branchOverride?: string | undefined;
  /** Passthrough configuration for the installer */
  readonly options: Readonly<Record<string, unknown>>;
}

/**
 * Setup registered for a plugin that declared a setup action.
 */
export interface SetupDescriptor {
  readonly action?: SetupAction | undefined;
  /** Identities activated before this plugin, in declared order */
  readonly dependencies: readonly string[];
  /** Events that gate activation; absent or empty means immediate */
  readonly triggerEvents?: readonly string[] | undefined;
}

/**
 * Setup lifecycle of a registered plugin.
 * `completed` is terminal and never left.
 */
export type SetupState = 'unregistered' | 'registered' | 'waiting' | 'activating' | 'completed' | 'failed';

/**
 * Package as reported by the installer.
 */
export interface InstalledPackage {
  identity: string;
  installPath: string;
  source: string;
  branchOverride?: string | undefined;
}

/**
 * Divergence between the checked-out revision and the remote one.
 */
export interface UpdateRecord {
  identity: string;
  installPath: string;
  localRevision: string;
  remoteRevision: string;
}

/**
 * Runtime occurrence that can release deferred setups.
 */
export interface RuntimeEvent {
  name: string;
  /** Buffer, file or URI the event originated from */
  resource?: string | undefined;
}

/**
 * Installer collaborator: clones, checks out and upgrades repositories.
 */
export interface PackageInstaller {
  /**
   * Install anything in `descriptors` that is missing. Idempotent.
   * @returns identities confirmed present afterwards
   */
  install(descriptors: readonly PluginDescriptor[]): Promise<string[]>;

  /** Packages currently installed */
  list(): Promise<InstalledPackage[]>;

  /** Bring each identity to its latest remote state */
  update(identities: readonly string[]): Promise<void>;
}
