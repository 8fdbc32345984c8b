// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type Refreshable} from '../spi/refreshable.js';
import {type KeyFormatter} from '../../key/key-formatter.js';
import {ConfigKeyFormatter} from '../../key/config-key-formatter.js';
import {ConfigurationError} from '../api/configuration-error.js';

/**
 * Base class for configuration sources that hold a flat map of fully qualified keys to raw values.
 *
 * <p>
 * Strings are stored verbatim. Numbers and booleans are stored as their string form.
 * Objects and arrays are stored as serialized JSON strings, which is how structured configuration reaches the binder.
 */
export abstract class LayeredConfigSource implements ConfigSource, Refreshable {
  /**
   * The flattened configuration keys and values.
   * @protected
   */
  protected readonly data: Map<string, string> = new Map<string, string>();

  protected constructor(protected readonly formatter: KeyFormatter = ConfigKeyFormatter.instance()) {}

  public abstract get name(): string;
  public abstract get ordinal(): number;

  public abstract load(): Promise<void>;

  public async refresh(): Promise<void> {
    await this.load();
  }

  public asString(key: string): string | null {
    return this.data.get(this.formatter.normalize(key)) ?? null;
  }

  public properties(): Map<string, string> {
    return new Map<string, string>(this.data);
  }

  public propertyNames(): Set<string> {
    return new Set<string>(this.data.keys());
  }

  /**
   * Replaces the whole content of the source. The current data is kept when any entry is rejected.
   */
  protected replace(entries: Iterable<[string, unknown]>): void {
    const staged: Map<string, string> = new Map<string, string>();
    for (const [key, value] of entries) {
      this.stage(staged, key, value);
    }

    this.data.clear();
    for (const [key, value] of staged) {
      this.data.set(key, value);
    }
  }

  /**
   * Stores a raw value under the normalized key. Null and undefined values are not stored.
   */
  private stage(staged: Map<string, string>, key: string, value: unknown): void {
    if (value === null || value === undefined) {
      return;
    }

    const normalizedKey: string = this.formatter.normalize(key);
    switch (typeof value) {
      case 'string': {
        staged.set(normalizedKey, value);
        break;
      }
      case 'number':
      case 'boolean':
      case 'bigint': {
        staged.set(normalizedKey, value.toString());
        break;
      }
      case 'object': {
        staged.set(normalizedKey, JSON.stringify(value));
        break;
      }
      default: {
        throw new ConfigurationError(
          `Unsupported configuration value type [ source = '${this.name}', key = '${normalizedKey}', type = '${typeof value}' ]`,
        );
      }
    }
  }
}
