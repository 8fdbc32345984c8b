// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from './key-formatter.js';
import {KEY_SEPARATOR} from '../../core/constants.js';

/**
 * Formats fully qualified configuration keys such as `pg:database`. Keys are case-sensitive, so normalization only
 * trims surrounding whitespace.
 */
export class ConfigKeyFormatter implements KeyFormatter {
  private static _instance?: ConfigKeyFormatter;

  public readonly separator: string = KEY_SEPARATOR;

  private constructor() {}

  public normalize(key: string): string {
    return key.trim();
  }

  public static instance(): KeyFormatter {
    if (!ConfigKeyFormatter._instance) {
      ConfigKeyFormatter._instance = new ConfigKeyFormatter();
    }

    return ConfigKeyFormatter._instance;
  }
}
