// SPDX-License-Identifier: Apache-2.0

import {BindingError} from './binding-error.js';

export class SecretOnNonDeferredFieldError extends BindingError {
  public constructor(
    public readonly field: string,
    public readonly kind: string,
  ) {
    super(`Field is marked as secret but is not a deferred field [ field = '${field}', kind = '${kind}' ]`, undefined, {
      field,
      kind,
    });
  }
}
