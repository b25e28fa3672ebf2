/**
 * Tests for GitInstaller against a fake git client and a temp directory.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GitInstaller } from '../../../src/runtime/installer/git-installer.js';
import type { PluginDescriptor } from '../../../src/types/pack.js';
import { FakeGitClient, createMockLogger, messagesOf, type MockLogger } from '../../helpers/factories.js';

const descriptor = (path: string, branchOverride?: string): PluginDescriptor => ({
  source: `https://github.com/${path}`,
  branchOverride,
  options: {},
});

describe('GitInstaller', () => {
  let installDir: string;
  let git: FakeGitClient;
  let logger: MockLogger;
  let installer: GitInstaller;

  beforeEach(async () => {
    installDir = await mkdtemp(join(tmpdir(), 'pluginpack-installer-'));
    git = new FakeGitClient();
    logger = createMockLogger();
    installer = new GitInstaller(git, logger, { installDir });
  });

  afterEach(async () => {
    await rm(installDir, { recursive: true, force: true });
  });

  describe('install', () => {
    it('clones missing packages at their branch override', async () => {
      const installed = await installer.install([descriptor('owner/a'), descriptor('owner/b', 'v2')]);

      expect(installed).toEqual(['owner/a', 'owner/b']);
      expect(git.calls).toEqual([
        `clone https://github.com/owner/a ${join(installDir, 'owner', 'a')}`,
        `clone https://github.com/owner/b ${join(installDir, 'owner', 'b')} v2`,
      ]);
    });

    it('does not clone a package that is already checked out', async () => {
      await installer.install([descriptor('owner/a')]);
      const installed = await installer.install([descriptor('owner/a')]);

      expect(installed).toEqual(['owner/a']);
      expect(git.calls.filter((c) => c.startsWith('clone'))).toHaveLength(1);
    });

    it('skips a failed clone and installs the rest', async () => {
      git.cloneErrors.set('https://github.com/owner/a', new Error('repository not found'));

      const installed = await installer.install([descriptor('owner/a'), descriptor('owner/b')]);

      expect(installed).toEqual(['owner/b']);
      expect(logger.calls.error).toEqual([[{ identity: 'owner/a', error: 'repository not found' }, 'Install failed']]);
    });

    it('refuses a source whose path climbs out of the install directory', async () => {
      const installed = await installer.install([descriptor('../../escaped'), descriptor('owner/a')]);

      expect(installed).toEqual(['owner/a']);
      expect(git.calls).toEqual([`clone https://github.com/owner/a ${join(installDir, 'owner', 'a')}`]);
      expect(logger.calls.error).toEqual([
        [{ source: 'https://github.com/../../escaped' }, 'Cannot install plugin without identity'],
      ]);
    });

    it('records installed packages in the manifest', async () => {
      await installer.install([descriptor('owner/b', 'v2')]);

      const manifest: unknown = JSON.parse(await readFile(join(installDir, 'pack-manifest.json'), 'utf-8'));
      expect(manifest).toMatchObject({
        version: 1,
        packages: { 'owner/b': { source: 'https://github.com/owner/b', branchOverride: 'v2' } },
      });
    });
  });

  describe('list', () => {
    it('reports an empty list before anything is installed', async () => {
      expect(await installer.list()).toEqual([]);
    });

    it('rejects a manifest that records an unsafe identity', async () => {
      const manifest = { version: 1, packages: { '../x': { source: 'https://github.com/x', installedAt: 'then' } } };
      await writeFile(join(installDir, 'pack-manifest.json'), JSON.stringify(manifest));

      await expect(installer.list()).rejects.toThrow('Invalid pack-manifest.json: unsafe package identity');
    });

    it('reports recorded packages that still exist on disk', async () => {
      await installer.install([descriptor('owner/a'), descriptor('owner/b', 'v2')]);
      await rm(join(installDir, 'owner', 'a'), { recursive: true });

      expect(await installer.list()).toEqual([
        {
          identity: 'owner/b',
          installPath: join(installDir, 'owner', 'b'),
          source: 'https://github.com/owner/b',
          branchOverride: 'v2',
        },
      ]);
      expect(messagesOf(logger, 'warn')).toEqual(['Recorded package is missing on disk']);
    });
  });

  describe('update', () => {
    it('pulls a package that tracks its default branch', async () => {
      await installer.install([descriptor('owner/a')]);
      git.calls.length = 0;

      await installer.update(['owner/a']);

      expect(git.calls).toEqual([`pull ${join(installDir, 'owner', 'a')}`]);
    });

    it('re-checks-out an override after fetching, pulling only when it has an upstream', async () => {
      await installer.install([descriptor('owner/tag', 'v2'), descriptor('owner/branch', 'dev')]);
      const branchPath = join(installDir, 'owner', 'branch');
      const branchRepo = git.repos.get(branchPath);
      if (branchRepo) branchRepo.upstream = 'origin/dev';
      git.calls.length = 0;

      await installer.update(['owner/tag', 'owner/branch']);

      const tagPath = join(installDir, 'owner', 'tag');
      expect(git.calls).toEqual([
        `fetch ${tagPath}`,
        `checkout ${tagPath} v2`,
        `fetch ${branchPath}`,
        `checkout ${branchPath} dev`,
        `pull ${branchPath}`,
      ]);
    });

    it('warns about packages it never installed', async () => {
      await installer.update(['owner/unknown']);

      expect(git.calls).toEqual([]);
      expect(logger.calls.warn).toEqual([[{ identity: 'owner/unknown' }, 'Not installed, cannot update']]);
    });

    it('keeps going when one update fails', async () => {
      await installer.install([descriptor('owner/a'), descriptor('owner/b')]);
      git.repos.delete(join(installDir, 'owner', 'a'));

      await installer.update(['owner/a', 'owner/b']);

      expect(messagesOf(logger, 'error')).toEqual(['Update failed']);
      expect(messagesOf(logger, 'info')).toContain('Updated');
    });
  });

  it('places checkouts under owner/repo', () => {
    expect(installer.pathFor('owner/repo')).toBe(join(installDir, 'owner', 'repo'));
  });

  it('refuses paths outside the install directory', () => {
    expect(() => installer.pathFor('owner/../../etc')).toThrow(
      'owner/../../etc: identity is not a path below the install directory'
    );
  });
});
