// SPDX-License-Identifier: Apache-2.0

import {BindingError} from './binding-error.js';

export class UnsupportedFieldTypeError extends BindingError {
  public constructor(
    public readonly field: string,
    public readonly kind: string,
  ) {
    super(`Unsupported field type [ field = '${field}', type = '${kind}' ]`, undefined, {field, kind});
  }
}
