#!/usr/bin/env node
/**
 * pluginpack command line.
 *
 *   pluginpack install [paths...]      register config modules, install, run setups
 *   pluginpack check                   list packages with upstream changes
 *   pluginpack update [names...] --all update selected (or all) divergent packages
 *   pluginpack list                    show installed packages
 */

import 'dotenv/config';

import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import { loadConfig, type MergedConfig } from './config/index.js';
import { createLogger } from './core/logger.js';
import { createPackManager, type PackManager } from './core/pack-manager.js';
import type { ProgressCallback } from './core/update-checker.js';
import { selectAll, selectNamed, type UpdateSelector } from './core/update-dispatcher.js';
import type { Logger } from './types/logger.js';
import type { UpdateRecord } from './types/pack.js';

const DEFAULT_MODULE_PATH = 'plugins';

interface GlobalOptions {
  config?: string;
}

async function boot(program: Command): Promise<{ config: MergedConfig; logger: Logger; pack: PackManager }> {
  const { config: configDir } = program.opts<GlobalOptions>();
  const config = await loadConfig(configDir);
  const logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    logDir: config.paths.logs,
    maxFiles: config.logging.maxFiles,
  });
  return { config, logger, pack: createPackManager(config, logger) };
}

const progressLine: ProgressCallback = ({ phase, identity, ok, completed, total }) => {
  process.stderr.write(`[${phase} ${String(completed)}/${String(total)}] ${identity}${ok ? '' : ' (failed)'}\n`);
};

function printDivergence(records: readonly UpdateRecord[]): void {
  if (records.length === 0) {
    console.log('All packages are up to date.');
    return;
  }
  const width = Math.max(...records.map((r) => r.identity.length));
  for (const record of records) {
    console.log(`${record.identity.padEnd(width)}  ${record.localRevision} -> ${record.remoteRevision}`);
  }
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name('pluginpack')
    .description('Register, install and update git-hosted plugins')
    .option('-c, --config <dir>', 'directory containing pack.json');

  program
    .command('install')
    .description('Register config modules and install their plugins')
    .argument('[paths...]', 'dotted module paths below the config module root', [DEFAULT_MODULE_PATH])
    .action(async (paths: string[]) => {
      const { config, pack } = await boot(program);
      for (const path of paths) {
        await pack.requireModules(path);
      }
      const summary = await pack.install();
      await pack.events.publish({ name: config.enterEvent });
      // Let setups released by the enter event fire before their timers are dropped
      await delay(config.setupDebounceMs);

      console.log(`Installed ${String(summary.installed.length)}/${String(summary.requested)} plugins.`);
      if (summary.failedSetups.length > 0) {
        console.log(`Setup aborted for: ${summary.failedSetups.join(', ')}`);
        process.exitCode = 1;
      }
      pack.dispose();
    });

  program
    .command('check')
    .description('Show installed packages whose remote has moved')
    .action(async () => {
      const { pack } = await boot(program);
      printDivergence(await pack.checkUpdates(progressLine));
    });

  program
    .command('update')
    .description('Update divergent packages')
    .argument('[names...]', 'identities to update (owner/repo)')
    .option('-a, --all', 'update every divergent package')
    .action(async (names: string[], options: { all?: boolean }) => {
      const { pack } = await boot(program);

      let selector: UpdateSelector;
      if (options.all) {
        selector = selectAll();
      } else if (names.length > 0) {
        selector = selectNamed(names);
      } else {
        // Nothing chosen yet: show what could be updated
        printDivergence(await pack.checkUpdates(progressLine));
        console.log('Pass package names or --all to update.');
        return;
      }

      const { divergent, updated } = await pack.update(selector, progressLine);
      printDivergence(divergent);
      if (updated.length > 0) {
        console.log(`Updated: ${updated.join(', ')}`);
      }
    });

  program
    .command('list')
    .description('List installed packages')
    .action(async () => {
      const { pack } = await boot(program);
      const installed = await pack.installed();
      if (installed.length === 0) {
        console.log('No packages installed.');
        return;
      }
      for (const pkg of installed) {
        const ref = pkg.branchOverride ? ` @ ${pkg.branchOverride}` : '';
        console.log(`${pkg.identity}${ref}  ${pkg.installPath}`);
      }
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
