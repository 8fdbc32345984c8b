// SPDX-License-Identifier: Apache-2.0

import {BinderError} from '../../core/errors/binder-error.js';

export class DeferredResolutionError extends BinderError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
