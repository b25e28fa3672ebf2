/**
 * pluginpack - plugin registration, dependency-ordered setup and git update reconciliation.
 *
 * Library entry point. The command line lives in `cli.ts`.
 */

// Specs and data model
export {
  identifier,
  group,
  plugin,
  specFromRaw,
  rawPluginSchema,
  type PluginSpec,
  type IdentifierSpec,
  type SinglePluginSpec,
  type GroupSpec,
  type PluginFields,
  type SetupAction,
} from './types/spec.js';
export type {
  PluginDescriptor,
  SetupDescriptor,
  SetupState,
  InstalledPackage,
  UpdateRecord,
  RuntimeEvent,
  PackageInstaller,
} from './types/pack.js';
export type { Logger } from './types/logger.js';

// Core
export { DEFAULT_HOST, normalizeSource, normalizeSpec, type NormalizeOptions } from './core/spec-normalizer.js';
export { resolveIdentity, identityFromUrl, sourceOf, type IdentityInput } from './core/identity.js';
export { SetupRegistry } from './core/setup-registry.js';
export { ActivationStore, type ActivationSnapshot } from './core/activation-store.js';
export { createPackContext, type PackContext } from './core/context.js';
export { buildInstallSet, type RegistrationOptions } from './core/registration.js';
export {
  SetupScheduler,
  DEFAULT_ENTER_EVENT,
  DEFAULT_SETUP_DEBOUNCE_MS,
  type SetupSchedulerOptions,
} from './core/setup-scheduler.js';
export { EventBus, createEventBus, type EventHandler, type SubscriptionOptions } from './core/event-bus.js';
export {
  UpdateChecker,
  DEFAULT_PARALLEL_LIMIT,
  DEFAULT_FALLBACK_BRANCHES,
  shortRevision,
  type UpdateCheckerOptions,
  type UpdateProgress,
  type ProgressCallback,
} from './core/update-checker.js';
export {
  dispatchUpdates,
  selectAll,
  selectNamed,
  type UpdateSelection,
  type UpdateSelector,
} from './core/update-dispatcher.js';
export {
  PackManager,
  createPackManager,
  type PackManagerOptions,
  type PackManagerDeps,
  type InstallSummary,
  type UpdateSummary,
} from './core/pack-manager.js';
export {
  PackError,
  ConfigurationError,
  CircularDependencyError,
  NotInstalledError,
  SetupError,
  FetchError,
  RemoteResolutionError,
  describeError,
  type PackErrorCode,
} from './core/pack-errors.js';
export { createLogger, type LoggerConfig } from './core/logger.js';

// Configuration
export * from './config/index.js';

// Runtime adapters
export { NodeGitClient, DEFAULT_GIT_TIMEOUT_MS, REMOTE_NAME, type GitClient, type NodeGitClientOptions } from './runtime/git/git-client.js';
export { GitInstaller, type GitInstallerOptions } from './runtime/installer/git-installer.js';
export {
  loadConfigModules,
  type LoadedConfigModule,
  type ModuleImporter,
  type ModuleLoaderOptions,
} from './runtime/loader/module-loader.js';
export { runPool, type PoolResult } from './utils/pool.js';
