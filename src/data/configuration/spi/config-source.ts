// SPDX-License-Identifier: Apache-2.0

import {type ConfigAccessor} from './config-accessor.js';

/**
 * A configuration source defines the methods for reading configuration data from a configuration source.
 * {@link ConfigSource} instances provide read-only access to configuration data.
 *
 * Represents a stack file on the file system, a variable in the shell environment, or an in-memory map.
 */
export interface ConfigSource extends ConfigAccessor {
  /**
   * The name of the configuration source.
   */
  readonly name: string;

  /**
   * The ordinal of the configuration source. Sources with a higher ordinal override sources with a lower one.
   */
  readonly ordinal: number;

  /**
   * Loads the configuration data from the configuration source.
   */
  load(): Promise<void>;
}
