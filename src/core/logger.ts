import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of run logs to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Pretty console output (development) */
  pretty: boolean;
  /** Write a per-run log file next to console output */
  toFile: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
};

const LOG_PREFIX = 'pack-';

function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty run logs and everything beyond the newest `maxFiles`.
 */
function pruneRunLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      // Another run may have removed it first
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}

/**
 * Create the pack logger.
 *
 * Console output goes through pino-pretty in development and raw JSON otherwise;
 * when `toFile` is set each run also writes a plain-text log under `logDir`.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty, toFile } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true, ignore: 'pid,hostname' },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 },
    });
  }

  if (toFile) {
    fs.mkdirSync(logDir, { recursive: true });
    pruneRunLogs(logDir, maxFiles);

    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({ level, transport: { targets } });
}
