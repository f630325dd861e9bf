/**
 * Config Registry
 *
 * Per-plugin list of declared configuration keys. Keys are not deduplicated:
 * a repeated key is kept and logged, and the later declaration wins when
 * values are resolved.
 */

import type { Logger } from '../types/logger.js';
import type { Conf, ConfigConverter } from '../types/plugin.js';
import { ValidationError } from './plugin-errors.js';

/**
 * Raw values from an external config source, keyed by config key.
 */
export type RawConfigValues = Readonly<Record<string, string | undefined>>;

export class ConfigRegistry {
  private readonly pluginName: string;
  private readonly logger: Logger;
  private readonly confs: Conf[] = [];

  constructor(pluginName: string, logger: Logger) {
    this.pluginName = pluginName;
    this.logger = logger.child({ component: 'config-registry', plugin: pluginName });
  }

  registerConfig<T>(key: string, defaultValue: T, converter?: ConfigConverter<T>): Conf<T> {
    if (this.confs.some((conf) => conf.key === key)) {
      this.logger.warn({ key }, 'Config key declared more than once; the later declaration shadows');
    }

    const conf: Conf<T> = Object.freeze({
      pluginName: this.pluginName,
      key,
      defaultValue,
      converter: converter ?? null,
    });
    this.confs.push(conf);
    return conf;
  }

  /**
   * Produce typed values from raw strings.
   * Missing keys take their default; present keys go through the converter.
   *
   * @throws ValidationError if a converter throws
   */
  resolve(raw: RawConfigValues = {}): Record<string, unknown> {
    const values: Record<string, unknown> = {};

    for (const conf of this.confs) {
      const rawValue = raw[conf.key];
      if (rawValue === undefined) {
        values[conf.key] = conf.defaultValue;
        continue;
      }
      if (!conf.converter) {
        values[conf.key] = rawValue;
        continue;
      }
      try {
        values[conf.key] = conf.converter(rawValue);
      } catch (error) {
        throw new ValidationError(
          this.pluginName,
          `config "${conf.key}": cannot convert ${JSON.stringify(rawValue)} (${error instanceof Error ? error.message : String(error)})`
        );
      }
    }

    return values;
  }

  list(): readonly Conf[] {
    return [...this.confs];
  }
}
