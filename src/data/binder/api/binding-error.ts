// SPDX-License-Identifier: Apache-2.0

import {BinderError} from '../../../core/errors/binder-error.js';

/**
 * Base class of the errors raised while walking a bind target.
 */
export class BindingError extends BinderError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
