// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {Regex} from '../../business/utils/regex.js';
import {type KeyFormatter} from './key-formatter.js';
import {ConfigKeyFormatter} from './config-key-formatter.js';

/**
 * Adds, strips and matches the namespace prefix of configuration keys.
 */
export class Prefix {
  private constructor() {
    // Utility class
    throw new UnsupportedOperationError('Cannot instantiate utility class');
  }

  public static add(key: string, prefix?: string, formatter: KeyFormatter = ConfigKeyFormatter.instance()): string {
    const normalizedKey: string = formatter.normalize(key);
    const finalPrefix: string | undefined = Prefix.terminated(prefix, formatter);
    return finalPrefix && !normalizedKey.startsWith(finalPrefix) ? `${finalPrefix}${normalizedKey}` : normalizedKey;
  }

  public static strip(key: string, prefix?: string, formatter: KeyFormatter = ConfigKeyFormatter.instance()): string {
    const normalizedKey: string = formatter.normalize(key);
    const finalPrefix: string | undefined = Prefix.terminated(prefix, formatter);
    return finalPrefix && normalizedKey.startsWith(finalPrefix)
      ? normalizedKey.replace(new RegExp(`^${Regex.escape(finalPrefix)}`), '')
      : normalizedKey;
  }

  public static matcher(
    key: string,
    prefix?: string,
    formatter: KeyFormatter = ConfigKeyFormatter.instance(),
  ): boolean {
    if (!key) {
      return false;
    }

    const prefixFilter: string | undefined = Prefix.terminated(prefix, formatter);
    return prefixFilter ? formatter.normalize(key).startsWith(prefixFilter) : true;
  }

  private static terminated(prefix: string | undefined, formatter: KeyFormatter): string | undefined {
    const normalizedPrefix: string | undefined = prefix ? formatter.normalize(prefix) : undefined;
    if (!normalizedPrefix) {
      return undefined;
    }

    return normalizedPrefix.endsWith(formatter.separator) ? normalizedPrefix : `${normalizedPrefix}${formatter.separator}`;
  }
}
