import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  isLogLevel,
  packConfigFileSchema,
  type MergedConfig,
  type PackConfigFile,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'pack.json';

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/pack.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: PackConfigFile | null = null;

  constructor(configPath = DEFAULT_CONFIG.paths.config, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): PackConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<PackConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // No file - defaults apply
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse ${filePath}: ${message}`);
    }

    const parsed = packConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Invalid ${filePath}: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown error'}`
      );
    }

    if (parsed.data.version !== undefined && parsed.data.version > CONFIG_FILE_VERSION) {
      throw new Error(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: PackConfigFile): void {
    if (file.parallelLimit !== undefined) config.parallelLimit = file.parallelLimit;
    if (file.defaultHost !== undefined) config.defaultHost = file.defaultHost;
    if (file.clearQueueAfterInstall !== undefined) config.clearQueueAfterInstall = file.clearQueueAfterInstall;
    if (file.setupDebounceMs !== undefined) config.setupDebounceMs = file.setupDebounceMs;
    if (file.enterEvent !== undefined) config.enterEvent = file.enterEvent;
    if (file.fallbackBranches !== undefined) config.fallbackBranches = [...file.fallbackBranches];
    if (file.gitTimeoutMs !== undefined) config.gitTimeoutMs = file.gitTimeoutMs;

    // Paths
    if (file.paths) {
      if (file.paths.installDir) config.paths.installDir = file.paths.installDir;
      if (file.paths.configModules) config.paths.configModules = file.paths.configModules;
      if (file.paths.logs) config.paths.logs = file.paths.logs;
    }

    // Logging
    if (file.logging) {
      if (file.logging.level) config.logging.level = file.logging.level;
      if (file.logging.pretty !== undefined) config.logging.pretty = file.logging.pretty;
      if (file.logging.maxFiles !== undefined) config.logging.maxFiles = file.logging.maxFiles;
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const limit = this.env['PACK_PARALLEL_LIMIT'];
    if (limit) {
      const parsed = Number(limit);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`PACK_PARALLEL_LIMIT must be a positive integer, got "${limit}"`);
      }
      config.parallelLimit = parsed;
    }

    // Data root moves every derived directory with it
    const dataPath = this.env['PACK_DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.installDir = join(dataPath, 'plugins');
      config.paths.logs = join(dataPath, 'logs');
    }

    const installDir = this.env['PACK_INSTALL_DIR'];
    if (installDir) {
      config.paths.installDir = installDir;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }
  }
}

export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string, env?: NodeJS.ProcessEnv): Promise<MergedConfig> {
  return createConfigLoader(configPath, env).load();
}
