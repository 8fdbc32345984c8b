// SPDX-License-Identifier: Apache-2.0

import {BinderError} from './binder-error.js';

export class UnsupportedOperationError extends BinderError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
