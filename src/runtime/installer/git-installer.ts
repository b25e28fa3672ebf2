/**
 * Git Installer
 *
 * Keeps each plugin as a git checkout under `{installDir}/{owner}/{repo}` and
 * records what it installed in `{installDir}/pack-manifest.json`.
 *
 * - install: clone anything missing (at its branch override), sequentially so
 *   dependencies land before dependents
 * - list: recorded packages whose checkout still exists
 * - update: pull, or re-check-out the override after fetching
 */

import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { isSafeIdentity, resolveIdentity } from '../../core/identity.js';
import { ConfigurationError, describeError } from '../../core/pack-errors.js';
import type { Logger } from '../../types/logger.js';
import type { InstalledPackage, PackageInstaller, PluginDescriptor } from '../../types/pack.js';
import type { GitClient } from '../git/git-client.js';

const MANIFEST_FILE = 'pack-manifest.json';
const MANIFEST_VERSION = 1;

const manifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  packages: z.record(
    z.string().refine(isSafeIdentity, { message: 'unsafe package identity' }),
    z.object({
      source: z.string().min(1),
      branchOverride: z.string().optional(),
      installedAt: z.string(),
    })
  ),
});

type InstallManifest = z.infer<typeof manifestSchema>;

export interface GitInstallerOptions {
  installDir: string;
}

export class GitInstaller implements PackageInstaller {
  private readonly logger: Logger;
  private readonly installDir: string;

  constructor(
    private readonly git: GitClient,
    logger: Logger,
    options: GitInstallerOptions
  ) {
    this.logger = logger.child({ component: 'git-installer' });
    this.installDir = options.installDir;
  }

  /**
   * @throws ConfigurationError for an identity that would leave the install directory
   */
  pathFor(identity: string): string {
    if (!isSafeIdentity(identity)) {
      throw new ConfigurationError(identity, 'identity is not a path below the install directory');
    }
    return join(this.installDir, ...identity.split('/'));
  }

  async install(descriptors: readonly PluginDescriptor[]): Promise<string[]> {
    const manifest = await this.readManifest();
    const confirmed: string[] = [];

    for (const descriptor of descriptors) {
      const identity = resolveIdentity(descriptor);
      if (identity === undefined) {
        this.logger.error({ source: descriptor.source }, 'Cannot install plugin without identity');
        continue;
      }

      const target = this.pathFor(identity);
      try {
        if (await exists(join(target, '.git'))) {
          this.logger.debug({ identity }, 'Already installed');
        } else {
          await mkdir(dirname(target), { recursive: true });
          this.logger.info({ identity, source: descriptor.source, ref: descriptor.branchOverride }, 'Installing');
          await this.git.clone(descriptor.source, target, descriptor.branchOverride);
        }
      } catch (error) {
        this.logger.error({ identity, error: describeError(error) }, 'Install failed');
        continue;
      }

      manifest.packages[identity] = {
        source: descriptor.source,
        branchOverride: descriptor.branchOverride,
        installedAt: manifest.packages[identity]?.installedAt ?? new Date().toISOString(),
      };
      confirmed.push(identity);
    }

    await this.writeManifest(manifest);
    return confirmed;
  }

  async list(): Promise<InstalledPackage[]> {
    const manifest = await this.readManifest();
    const installed: InstalledPackage[] = [];

    for (const [identity, entry] of Object.entries(manifest.packages)) {
      const installPath = this.pathFor(identity);
      if (!(await exists(join(installPath, '.git')))) {
        this.logger.warn({ identity, installPath }, 'Recorded package is missing on disk');
        continue;
      }
      installed.push({ identity, installPath, source: entry.source, branchOverride: entry.branchOverride });
    }

    return installed;
  }

  async update(identities: readonly string[]): Promise<void> {
    const manifest = await this.readManifest();

    for (const identity of identities) {
      const entry = manifest.packages[identity];
      if (!entry) {
        this.logger.warn({ identity }, 'Not installed, cannot update');
        continue;
      }

      try {
        const repoPath = this.pathFor(identity);
        if (entry.branchOverride !== undefined) {
          await this.git.fetch(repoPath);
          await this.git.checkout(repoPath, entry.branchOverride);
          // A tag or commit override has nothing to pull
          if (await this.git.upstreamRef(repoPath)) {
            await this.git.pull(repoPath);
          }
        } else {
          await this.git.pull(repoPath);
        }
        this.logger.info({ identity }, 'Updated');
      } catch (error) {
        this.logger.error({ identity, error: describeError(error) }, 'Update failed');
      }
    }
  }

  private get manifestPath(): string {
    return join(this.installDir, MANIFEST_FILE);
  }

  private async readManifest(): Promise<InstallManifest> {
    let content: string;
    try {
      content = await readFile(this.manifestPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return { version: MANIFEST_VERSION, packages: {} };
      }
      throw error;
    }

    const parsed = manifestSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid ${MANIFEST_FILE}: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
    }
    return parsed.data;
  }

  /**
   * Write through a temp file and rename so readers never see half a manifest.
   */
  private async writeManifest(manifest: InstallManifest): Promise<void> {
    await mkdir(this.installDir, { recursive: true });
    const tmpPath = `${this.manifestPath}.${String(process.pid)}.tmp`;
    await writeFile(tmpPath, JSON.stringify(manifest, null, 2) + '\n');
    await rename(tmpPath, this.manifestPath);
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
