// SPDX-License-Identifier: Apache-2.0

import {BindingError} from './binding-error.js';

/**
 * Thrown when a JSON value does not have the shape the target field expects.
 *
 * error metadata will include `path`, `expected` and `actual`.
 */
export class TypeMismatchError extends BindingError {
  public constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string,
    cause?: unknown,
  ) {
    super(`Type mismatch [ path = '${path}', expected = '${expected}', actual = '${actual}' ]`, cause, {
      path,
      expected,
      actual,
    });
  }
}
