/**
 * Config Module Loader
 *
 * Resolves a dotted path (`plugins.editor`) below a root directory to
 * configuration modules and turns their exports into plugin specs:
 * - `{root}/plugins/editor.{js,mjs,ts}` → that one module
 * - `{root}/plugins/editor/` → every immediate module child, in name order
 *
 * Each module must export (default or named) a plugin table with `source`.
 * Unreadable or invalid modules are reported and skipped.
 */

import { readdir, stat } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigurationError, describeError } from '../../core/pack-errors.js';
import type { Logger } from '../../types/logger.js';
import { specFromRaw, type PluginSpec } from '../../types/spec.js';

const MODULE_EXTENSIONS = ['.js', '.mjs', '.ts'] as const;
const DOTTED_PATH = /^[\w-]+(?:\.[\w-]+)*$/;

export type ModuleImporter = (absolutePath: string) => Promise<unknown>;

export interface ModuleLoaderOptions {
  /** Directory dotted paths are resolved against */
  rootDir: string;
  logger: Logger;
  /** Override how a module file is imported */
  importModule?: ModuleImporter;
}

export interface LoadedConfigModule {
  modulePath: string;
  file: string;
  spec: PluginSpec;
}

const defaultImporter: ModuleImporter = (absolutePath) => import(pathToFileURL(absolutePath).href);

export async function loadConfigModules(
  dottedPath: string,
  options: ModuleLoaderOptions
): Promise<LoadedConfigModule[]> {
  const log = options.logger.child({ component: 'module-loader', path: dottedPath });
  const importModule = options.importModule ?? defaultImporter;

  if (!DOTTED_PATH.test(dottedPath)) {
    log.error(new ConfigurationError(dottedPath, 'not a dotted module path').message);
    return [];
  }

  const base = join(options.rootDir, ...dottedPath.split('.'));

  try {
    const file = await findModuleFile(base);
    if (file) {
      const loaded = await loadOne(dottedPath, file, importModule, log);
      return loaded ? [loaded] : [];
    }

    if (await isDirectory(base)) {
      const children = await listModuleFiles(base);
      const loaded: LoadedConfigModule[] = [];
      for (const [stem, childFile] of children) {
        const one = await loadOne(`${dottedPath}.${stem}`, childFile, importModule, log);
        if (one) loaded.push(one);
      }
      log.debug({ modules: loaded.length, candidates: children.length }, 'Loaded config directory');
      return loaded;
    }
  } catch (error) {
    log.error({ resolved: base, error: describeError(error) }, 'Cannot read config path');
    return [];
  }

  log.error({ resolved: base }, new ConfigurationError(dottedPath, 'is neither a module nor a directory').message);
  return [];
}

async function loadOne(
  modulePath: string,
  file: string,
  importModule: ModuleImporter,
  log: Logger
): Promise<LoadedConfigModule | undefined> {
  try {
    let mod: unknown;
    try {
      mod = await importModule(file);
    } catch (error) {
      throw new ConfigurationError(modulePath, `failed to import: ${describeError(error)}`, { cause: error });
    }

    const table = pluginTableOf(mod);
    if (table === undefined) {
      throw new ConfigurationError(modulePath, 'does not export a plugin table with a source field');
    }

    return { modulePath, file, spec: specFromRaw(table, modulePath) };
  } catch (error) {
    log.error({ module: modulePath, file, error: describeError(error) }, 'Skipping config module');
    return undefined;
  }
}

/**
 * Default export when it carries `source`, otherwise the module itself.
 */
function pluginTableOf(mod: unknown): object | undefined {
  if (typeof mod !== 'object' || mod === null) {
    return undefined;
  }
  if ('default' in mod && hasSource(mod.default)) {
    return mod.default;
  }
  return hasSource(mod) ? mod : undefined;
}

function hasSource(value: unknown): value is { source: unknown } {
  return typeof value === 'object' && value !== null && 'source' in value;
}

async function findModuleFile(base: string): Promise<string | undefined> {
  for (const ext of MODULE_EXTENSIONS) {
    if ((await pathKind(base + ext)) === 'file') {
      return base + ext;
    }
  }
  return undefined;
}

async function isDirectory(path: string): Promise<boolean> {
  return (await pathKind(path)) === 'directory';
}

async function pathKind(path: string): Promise<'file' | 'directory' | undefined> {
  try {
    const s = await stat(path);
    if (s.isDirectory()) return 'directory';
    return s.isFile() ? 'file' : undefined;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return undefined;
    }
    throw error;
  }
}

/**
 * stem → file for each module child. When a stem exists with several
 * extensions the earliest in MODULE_EXTENSIONS wins.
 */
async function listModuleFiles(dir: string): Promise<[string, string][]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const byStem = new Map<string, { file: string; rank: number }>();

  for (const entry of entries) {
    if (!entry.isFile() || entry.name.endsWith('.d.ts')) continue;

    const { name: stem, ext } = parse(entry.name);
    const rank = MODULE_EXTENSIONS.findIndex((e) => e === ext);
    if (rank < 0 || stem.includes('.')) continue;

    const existing = byStem.get(stem);
    if (!existing || rank < existing.rank) {
      byStem.set(stem, { file: join(dir, entry.name), rank });
    }
  }

  return [...byStem.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([stem, { file }]) => [stem, file]);
}
