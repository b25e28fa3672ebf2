/**
 * Pack Manager
 *
 * Entry points over one PackContext:
 * - register / registerRaw / requireModules: queue specs
 * - install: drain the queue, install, activate setups
 * - checkUpdates / update: reconcile installed checkouts and dispatch updates
 */

import type { MergedConfig } from '../config/index.js';
import { NodeGitClient, type GitClient } from '../runtime/git/git-client.js';
import { GitInstaller } from '../runtime/installer/git-installer.js';
import { loadConfigModules, type ModuleImporter } from '../runtime/loader/module-loader.js';
import type { Logger } from '../types/logger.js';
import type { InstalledPackage, PackageInstaller, UpdateRecord } from '../types/pack.js';
import { specFromRaw, type PluginSpec } from '../types/spec.js';
import { createPackContext, type PackContext } from './context.js';
import { createEventBus, type EventBus } from './event-bus.js';
import { describeError } from './pack-errors.js';
import { buildInstallSet } from './registration.js';
import { SetupScheduler } from './setup-scheduler.js';
import { UpdateChecker, type ProgressCallback } from './update-checker.js';
import { dispatchUpdates, type UpdateSelector } from './update-dispatcher.js';

export interface PackManagerOptions {
  defaultHost?: string;
  /** Drain the queue after install (default true) */
  clearQueueAfterInstall?: boolean;
  parallelLimit?: number;
  fallbackBranches?: readonly string[];
  setupDebounceMs?: number;
  enterEvent?: string;
  /** Root for dotted config module paths */
  moduleRoot?: string;
  importModule?: ModuleImporter;
}

export interface PackManagerDeps {
  installer: PackageInstaller;
  git: GitClient;
  events: EventBus;
  logger: Logger;
  /** Defaults to a fresh context */
  context?: PackContext;
}

export interface InstallSummary {
  /** Descriptors handed to the installer */
  requested: number;
  /** Identities the installer confirmed */
  installed: string[];
  /** Identities whose setup branch aborted */
  failedSetups: string[];
}

export interface UpdateSummary {
  divergent: UpdateRecord[];
  updated: string[];
}

export class PackManager {
  readonly context: PackContext;
  readonly events: EventBus;
  readonly scheduler: SetupScheduler;
  readonly checker: UpdateChecker;

  private readonly installer: PackageInstaller;
  private readonly logger: Logger;
  private readonly options: PackManagerOptions;

  constructor(deps: PackManagerDeps, options: PackManagerOptions = {}) {
    this.context = deps.context ?? createPackContext();
    this.events = deps.events;
    this.installer = deps.installer;
    this.logger = deps.logger.child({ component: 'pack' });
    this.options = options;

    this.scheduler = new SetupScheduler(this.context, deps.events, deps.logger, {
      debounceMs: options.setupDebounceMs,
      enterEvent: options.enterEvent,
    });
    this.checker = new UpdateChecker(deps.git, deps.logger, {
      parallelLimit: options.parallelLimit,
      fallbackBranches: options.fallbackBranches,
    });
  }

  register(spec: PluginSpec): void {
    this.context.queue.push(spec);
  }

  /**
   * Register an untyped spec (string, table with `source`, or array).
   * @returns false when the value was rejected and reported
   */
  registerRaw(value: unknown, where = 'spec'): boolean {
    try {
      this.register(specFromRaw(value, where));
      return true;
    } catch (error) {
      this.logger.error({ where, error: describeError(error) }, 'Rejected plugin spec');
      return false;
    }
  }

  /**
   * Register every config module found under a dotted path.
   * @returns number of modules registered
   */
  async requireModules(dottedPath: string): Promise<number> {
    const modules = await loadConfigModules(dottedPath, {
      rootDir: this.options.moduleRoot ?? process.cwd(),
      logger: this.logger,
      importModule: this.options.importModule,
    });
    for (const mod of modules) {
      this.register(mod.spec);
    }
    return modules.length;
  }

  async install(): Promise<InstallSummary> {
    const { queue } = this.context;
    const specs = [...queue];
    if (this.options.clearQueueAfterInstall ?? true) {
      queue.length = 0;
    }

    const installSet = buildInstallSet(this.context, specs, {
      defaultHost: this.options.defaultHost,
      logger: this.logger,
    });

    let installed: string[] = [];
    if (installSet.length > 0) {
      try {
        installed = await this.installer.install(installSet);
      } catch (error) {
        this.logger.error({ error: describeError(error) }, 'Installer failed');
      }
    }
    for (const identity of installed) {
      this.context.activation.markInstalled(identity);
    }

    const failedSetups = this.scheduler.activateAll();

    this.logger.info(
      {
        requested: installSet.length,
        installed: installed.length,
        failedSetups: failedSetups.length,
        waiting: this.scheduler.waiting().length,
      },
      'Install complete'
    );

    return { requested: installSet.length, installed, failedSetups };
  }

  /**
   * Packages the installer reports; empty (and logged) when it cannot list them.
   */
  async installed(): Promise<InstalledPackage[]> {
    try {
      return await this.installer.list();
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Could not list installed packages');
      return [];
    }
  }

  /**
   * Reconcile installed packages against their remotes. A branch override
   * registered in this session wins over the one the installer reports.
   */
  async checkUpdates(onProgress?: ProgressCallback): Promise<UpdateRecord[]> {
    const { branchOverrides } = this.context;
    const packages = (await this.installed()).map((pkg) => ({
      ...pkg,
      branchOverride: branchOverrides.get(pkg.identity) ?? pkg.branchOverride,
    }));
    return this.checker.check(packages, onProgress);
  }

  async update(selector: UpdateSelector, onProgress?: ProgressCallback): Promise<UpdateSummary> {
    const divergent = await this.checkUpdates(onProgress);
    let updated: string[] = [];
    try {
      updated = await dispatchUpdates(divergent, selector, this.installer, this.logger);
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Batch update failed');
    }
    return { divergent, updated };
  }

  dispose(): void {
    this.scheduler.dispose();
  }
}

/**
 * Wire a PackManager with the git client and installer from configuration.
 */
export function createPackManager(config: MergedConfig, logger: Logger): PackManager {
  const git = new NodeGitClient({ timeoutMs: config.gitTimeoutMs });
  const installer = new GitInstaller(git, logger, { installDir: config.paths.installDir });

  return new PackManager(
    { installer, git, events: createEventBus(logger), logger },
    {
      defaultHost: config.defaultHost,
      clearQueueAfterInstall: config.clearQueueAfterInstall,
      parallelLimit: config.parallelLimit,
      fallbackBranches: config.fallbackBranches,
      setupDebounceMs: config.setupDebounceMs,
      enterEvent: config.enterEvent,
      moduleRoot: config.paths.configModules,
    }
  );
}
