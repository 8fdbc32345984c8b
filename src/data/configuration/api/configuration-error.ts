// SPDX-License-Identifier: Apache-2.0

import {BinderError} from '../../../core/errors/binder-error.js';

/**
 * General purpose error for configuration failures.
 */
export class ConfigurationError extends BinderError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
