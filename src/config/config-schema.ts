import { z } from 'zod';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Pack config file schema (data/config/pack.json).
 * Every field is optional; defaults fill the gaps.
 */
export const packConfigFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive().optional(),

    /** Maximum concurrent remote fetches during update checks */
    parallelLimit: z.number().int().positive().optional(),

    /** Host prefixed to `owner/repo` shorthands */
    defaultHost: z.string().url().optional(),

    /** Drain the registration queue after each install (false = re-install the same queue) */
    clearQueueAfterInstall: z.boolean().optional(),

    /** Delay between a trigger event and a deferred setup, in ms */
    setupDebounceMs: z.number().int().nonnegative().optional(),

    /** Event exempt from the transient-resource filter */
    enterEvent: z.string().min(1).optional(),

    /** Branches tried when no other remote ref resolves */
    fallbackBranches: z.array(z.string().min(1)).optional(),

    /** Timeout for a single git invocation, in ms */
    gitTimeoutMs: z.number().int().positive().optional(),

    paths: z
      .object({
        /** Where plugins are checked out */
        installDir: z.string().min(1).optional(),
        /** Root that dotted config module paths resolve against */
        configModules: z.string().min(1).optional(),
        logs: z.string().min(1).optional(),
      })
      .optional(),

    logging: z
      .object({
        level: logLevelSchema.optional(),
        pretty: z.boolean().optional(),
        maxFiles: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .strict();

export type PackConfigFile = z.infer<typeof packConfigFileSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

export function isLogLevel(value: string): value is LogLevel {
  return logLevelSchema.safeParse(value).success;
}

/**
 * Configuration after merging defaults, file and environment.
 */
export interface MergedConfig {
  parallelLimit: number;
  defaultHost: string;
  clearQueueAfterInstall: boolean;
  setupDebounceMs: number;
  enterEvent: string;
  fallbackBranches: string[];
  gitTimeoutMs: number;

  paths: {
    /** Base data directory */
    data: string;
    /** Directory holding pack.json */
    config: string;
    installDir: string;
    configModules: string;
    logs: string;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    maxFiles: number;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  parallelLimit: 4,
  defaultHost: 'https://github.com',
  clearQueueAfterInstall: true,
  setupDebounceMs: 10,
  enterEvent: 'enter',
  fallbackBranches: ['main', 'master'],
  gitTimeoutMs: 60_000,

  paths: {
    data: 'data',
    config: 'data/config',
    installDir: 'data/plugins',
    configModules: 'config',
    logs: 'data/logs',
  },

  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    maxFiles: 10,
  },
};
