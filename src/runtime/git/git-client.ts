/**
 * Git Client - the git operations pluginpack needs, behind a port.
 *
 * Runs the git binary through child_process.execFile (no shell) with a
 * timeout. Every call targets an explicit repository path via `-C`.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export const DEFAULT_GIT_TIMEOUT_MS = 60_000;

/** The one remote plugins are cloned from, fetched and compared against */
export const REMOTE_NAME = 'origin';

export interface GitClient {
  /** Clone `source` into `targetPath`, optionally at a branch or tag */
  clone(source: string, targetPath: string, ref?: string): Promise<void>;

  /** Check out a branch, tag or commit */
  checkout(repoPath: string, ref: string): Promise<void>;

  /** Fast-forward the current branch from its upstream */
  pull(repoPath: string): Promise<void>;

  /** Update `REMOTE_NAME` tracking refs and tags; never touches the worktree */
  fetch(repoPath: string): Promise<void>;

  /** Full commit hash `ref` points at; rejects when it does not resolve */
  revParse(repoPath: string, ref: string): Promise<string>;

  /** Upstream of the current branch (e.g. `origin/main`), if any */
  upstreamRef(repoPath: string): Promise<string | undefined>;

  /** Remote default branch ref (e.g. `origin/main`), if known locally */
  remoteDefaultBranch(repoPath: string): Promise<string | undefined>;
}

export interface NodeGitClientOptions {
  /** git executable (default: `git` from PATH) */
  binary?: string;
  timeoutMs?: number;
}

export class NodeGitClient implements GitClient {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: NodeGitClientOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  async clone(source: string, targetPath: string, ref?: string): Promise<void> {
    const args = ['clone', '--quiet', '--recurse-submodules'];
    if (ref !== undefined) {
      args.push('--branch', ref);
    }
    args.push('--', source, targetPath);
    await this.run(args);
  }

  async checkout(repoPath: string, ref: string): Promise<void> {
    await this.run(['-C', repoPath, 'checkout', '--quiet', ref]);
  }

  async pull(repoPath: string): Promise<void> {
    await this.run(['-C', repoPath, 'pull', '--quiet', '--ff-only']);
  }

  async fetch(repoPath: string): Promise<void> {
    await this.run(['-C', repoPath, 'fetch', '--quiet', '--tags', '--prune', REMOTE_NAME]);
  }

  async revParse(repoPath: string, ref: string): Promise<string> {
    const out = await this.run(['-C', repoPath, 'rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    if (out === '') {
      throw new Error(`ref ${ref} did not resolve`);
    }
    return out;
  }

  async upstreamRef(repoPath: string): Promise<string | undefined> {
    return this.optional(['-C', repoPath, 'rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{upstream}']);
  }

  async remoteDefaultBranch(repoPath: string): Promise<string | undefined> {
    return this.optional(['-C', repoPath, 'symbolic-ref', '--quiet', '--short', `refs/remotes/${REMOTE_NAME}/HEAD`]);
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, args, {
      timeout: this.timeoutMs,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    return stdout.trim();
  }

  /**
   * Run a query whose failure means "not set" rather than an error.
   */
  private async optional(args: string[]): Promise<string | undefined> {
    try {
      const out = await this.run(args);
      return out === '' ? undefined : out;
    } catch (error) {
      if (isExitError(error)) {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * git ran and exited non-zero (as opposed to not being runnable at all).
 */
function isExitError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'number';
}
