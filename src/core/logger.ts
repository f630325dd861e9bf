import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files; null disables file output */
  logDir: string | null;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing on the console */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: null,
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_FILE_PREFIX = 'host-';

/**
 * Generate timestamp-based log filename.
 */
export function generateLogFilename(now = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  return `${LOG_FILE_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty log files and all but the newest `maxFiles` others.
 *
 * @returns Names of the files removed
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): string[] {
  if (!fs.existsSync(logDir)) {
    return [];
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { name: f, path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const empty = files.filter((f) => f.size === 0);
  const stale = files
    .filter((f) => f.size > 0)
    .sort((a, b) => b.mtime - a.mtime) // newest first
    .slice(maxFiles);

  const removed: string[] = [];
  for (const file of [...empty, ...stale]) {
    fs.rmSync(file.path, { force: true });
    removed.push(file.name);
  }
  return removed;
}

/**
 * Create a configured logger instance.
 *
 * Console output goes through pino-pretty unless `pretty` is off; when a
 * `logDir` is given, a plain-text copy is also written to a timestamped
 * file there and old files beyond `maxFiles` are pruned.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 }, // stdout
    });
  }

  if (logDir !== null) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, maxFiles);

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

  return pino({
    level,
    transport: { targets },
  });
}
