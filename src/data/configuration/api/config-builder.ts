// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type Config} from './config.js';

/**
 * Fluent builder for creating a Config instance.
 */
export interface ConfigBuilder {
  /**
   * Adds the environment configuration source to the configuration.
   *
   * @param variable - The environment variable holding the JSON encoded configuration.
   */
  withEnvironment(variable?: string): ConfigBuilder;

  /**
   * Adds a stack file configuration source to the configuration.
   *
   * @param directory - The directory containing the stack file.
   * @param fileName - The name of the stack file.
   */
  withStackFile(directory: string, fileName: string): ConfigBuilder;

  /**
   * Adds the specified configuration sources to the configuration.
   *
   * @param sources - The configuration sources to be added.
   */
  withSources(...sources: ConfigSource[]): ConfigBuilder;

  /**
   * Builds a {@link Config} instance. The sources are not loaded until {@link Config#refresh} is called.
   */
  build(): Config;
}
