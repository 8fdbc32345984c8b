// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';

/**
 * Thrown when a required configuration key is absent from every configuration source.
 */
export class MissingConfigError extends ConfigurationError {
  public constructor(public readonly key: string) {
    super(`Missing required configuration value [ key = '${key}' ]`, undefined, {key});
  }
}
