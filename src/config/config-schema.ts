import { z } from 'zod';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Host configuration file schema.
 *
 * This is what gets loaded from data/config/host.json.
 * All fields except `version` are optional; defaults fill the gaps.
 */
export const hostConfigFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive(),

    paths: z
      .object({
        /** Root of every plugin work dir */
        persistentRoot: z.string().min(1).optional(),
        /** Log file directory */
        logs: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    /** Debug mode: plugins skip saving on unload */
    debug: z.boolean().optional(),

    logging: z
      .object({
        level: logLevelSchema.optional(),
        pretty: z.boolean().optional(),
        /** Write a log file under paths.logs */
        toFile: z.boolean().optional(),
        maxFiles: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    plugins: z
      .object({
        /** Raw string config values keyed by plugin name, then config key */
        configs: z.record(z.string(), z.record(z.string(), z.string())).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type HostConfigFile = z.infer<typeof hostConfigFileSchema>;

/**
 * Fully merged host configuration.
 */
export interface MergedConfig {
  paths: {
    /** Base data directory */
    data: string;
    /** Directory holding host.json */
    config: string;
    persistentRoot: string;
    logs: string;
  };
  debug: boolean;
  logging: {
    level: LogLevel;
    pretty: boolean;
    /** Log file directory, null when file logging is off */
    logDir: string | null;
    maxFiles: number;
  };
  plugins: {
    configs: Record<string, Record<string, string>>;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  paths: {
    data: './data',
    config: './data/config',
    persistentRoot: './data/plugins',
    logs: './data/logs',
  },
  debug: false,
  logging: {
    level: 'info',
    pretty: true,
    logDir: null,
    maxFiles: 10,
  },
  plugins: {
    configs: {},
  },
};

/**
 * Parse a log level from an untrusted string.
 */
export function parseLogLevel(value: string): LogLevel | null {
  const result = logLevelSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : null;
}
