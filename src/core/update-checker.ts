/**
 * Update Checker
 *
 * Read-only reconciliation of installed git checkouts against their remote:
 * 1. Fetch every package through a sliding-window pool (at most `parallelLimit` in flight)
 * 2. Once all fetches settle, compare the local HEAD with the remote revision
 * 3. Resolve with the packages whose revisions differ
 *
 * A package that fails to fetch or resolve is logged and left out; it never
 * aborts the batch.
 */

import { REMOTE_NAME, type GitClient } from '../runtime/git/git-client.js';
import type { Logger } from '../types/logger.js';
import type { InstalledPackage, UpdateRecord } from '../types/pack.js';
import { runPool } from '../utils/pool.js';
import { FetchError, RemoteResolutionError, describeError } from './pack-errors.js';

export const DEFAULT_PARALLEL_LIMIT = 4;
export const DEFAULT_FALLBACK_BRANCHES: readonly string[] = ['main', 'master'];

const SHORT_REVISION_LENGTH = 7;

export interface UpdateCheckerOptions {
  /** Maximum concurrent fetches */
  parallelLimit?: number;
  /** Branch names tried when nothing else resolves */
  fallbackBranches?: readonly string[];
}

export interface UpdateProgress {
  phase: 'fetch' | 'compare';
  identity: string;
  ok: boolean;
  /** Packages finished in this phase so far */
  completed: number;
  /** Packages entering this phase */
  total: number;
}

export type ProgressCallback = (progress: UpdateProgress) => void;

export function shortRevision(revision: string): string {
  return revision.slice(0, SHORT_REVISION_LENGTH);
}

export class UpdateChecker {
  private readonly logger: Logger;
  private readonly parallelLimit: number;
  private readonly fallbackBranches: readonly string[];

  constructor(
    private readonly git: GitClient,
    logger: Logger,
    options: UpdateCheckerOptions = {}
  ) {
    this.logger = logger.child({ component: 'update-checker' });
    this.parallelLimit = options.parallelLimit ?? DEFAULT_PARALLEL_LIMIT;
    this.fallbackBranches = options.fallbackBranches ?? DEFAULT_FALLBACK_BRANCHES;

    if (!Number.isInteger(this.parallelLimit) || this.parallelLimit < 1) {
      throw new RangeError(`parallelLimit must be a positive integer, got ${String(this.parallelLimit)}`);
    }
  }

  /**
   * Check every package and resolve with the divergent ones.
   * Settles once, after every package has been accounted for.
   */
  async check(packages: readonly InstalledPackage[], onProgress?: ProgressCallback): Promise<UpdateRecord[]> {
    const fetched = await this.fetchAll(packages, onProgress);

    let compared = 0;
    const results = await runPool(fetched, this.parallelLimit, async (pkg) => {
      let record: UpdateRecord | undefined;
      let ok = false;
      try {
        record = await this.compare(pkg);
        ok = true;
      } finally {
        compared++;
        onProgress?.({ phase: 'compare', identity: pkg.identity, ok, completed: compared, total: fetched.length });
      }
      return record;
    });

    const divergent: UpdateRecord[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        if (result.value) divergent.push(result.value);
        return;
      }
      this.logger.warn(
        { identity: fetched[index]?.identity, error: describeError(result.reason) },
        'Could not compare revisions'
      );
    });

    this.logger.info(
      { packages: packages.length, compared: fetched.length, divergent: divergent.length },
      'Update check complete'
    );
    return divergent;
  }

  /**
   * Remote revision for a package, following the resolution chain:
   * branch override (as branch, then as tag) → upstream → remote default → fallback branches.
   *
   * @throws RemoteResolutionError when nothing resolves
   */
  async resolveRemoteRevision(pkg: InstalledPackage): Promise<string> {
    const attempted: string[] = [];

    for await (const ref of this.candidateRefs(pkg)) {
      attempted.push(ref);
      try {
        return await this.git.revParse(pkg.installPath, ref);
      } catch (error) {
        this.logger.debug({ identity: pkg.identity, ref, error: describeError(error) }, 'Ref did not resolve');
      }
    }

    throw new RemoteResolutionError(pkg.identity, attempted);
  }

  private async fetchAll(
    packages: readonly InstalledPackage[],
    onProgress: ProgressCallback | undefined
  ): Promise<InstalledPackage[]> {
    let fetchedCount = 0;
    const results = await runPool(packages, this.parallelLimit, async (pkg) => {
      let ok = false;
      try {
        await this.git.fetch(pkg.installPath);
        ok = true;
      } catch (error) {
        throw new FetchError(pkg.identity, error);
      } finally {
        fetchedCount++;
        onProgress?.({ phase: 'fetch', identity: pkg.identity, ok, completed: fetchedCount, total: packages.length });
      }
      return pkg;
    });

    const fetched: InstalledPackage[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') {
        fetched.push(result.value);
      } else {
        this.logger.warn({ error: describeError(result.reason) }, 'Skipping package, fetch failed');
      }
    }
    return fetched;
  }

  private async compare(pkg: InstalledPackage): Promise<UpdateRecord | undefined> {
    const [local, remote] = await Promise.all([
      this.git.revParse(pkg.installPath, 'HEAD'),
      this.resolveRemoteRevision(pkg),
    ]);

    if (local === remote) {
      return undefined;
    }

    return {
      identity: pkg.identity,
      installPath: pkg.installPath,
      localRevision: shortRevision(local),
      remoteRevision: shortRevision(remote),
    };
  }

  /**
   * Candidate refs in precedence order. Lookups for later steps only run
   * when earlier candidates failed.
   */
  private async *candidateRefs(pkg: InstalledPackage): AsyncGenerator<string> {
    const override = pkg.branchOverride;
    if (override !== undefined && override !== '') {
      yield `${REMOTE_NAME}/${override}`;
      yield `refs/tags/${override}`;
      return;
    }

    const upstream = await this.lookup(pkg, 'upstream', () => this.git.upstreamRef(pkg.installPath));
    if (upstream) yield upstream;

    const remoteDefault = await this.lookup(pkg, 'remote default', () =>
      this.git.remoteDefaultBranch(pkg.installPath)
    );
    if (remoteDefault) yield remoteDefault;

    for (const branch of this.fallbackBranches) {
      yield `${REMOTE_NAME}/${branch}`;
    }
  }

  private async lookup(
    pkg: InstalledPackage,
    what: string,
    query: () => Promise<string | undefined>
  ): Promise<string | undefined> {
    try {
      return await query();
    } catch (error) {
      this.logger.debug({ identity: pkg.identity, lookup: what, error: describeError(error) }, 'Ref lookup failed');
      return undefined;
    }
  }
}
