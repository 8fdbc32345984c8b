// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {type Refreshable} from '../../data/configuration/spi/refreshable.js';

export class ReflectAssist {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  /**
   * TypeScript custom type guard that checks if the provided object implements Refreshable.
   *
   * @param v - The object to check.
   * @returns true if the object implements Refreshable, false otherwise.
   */
  public static isRefreshable(v: object): v is Refreshable {
    return typeof v === 'object' && !!v && 'refresh' in v && typeof v.refresh === 'function';
  }

  /**
   * TypeScript custom type guard for plain JSON objects, arrays and null are excluded.
   */
  public static isJsonObject(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
  }

  /**
   * Names the JSON shape of a value the way it is reported in type mismatch errors.
   */
  public static shapeOf(v: unknown): string {
    if (v === null) {
      return 'null';
    }

    if (Array.isArray(v)) {
      return 'array';
    }

    if (v instanceof Map) {
      return 'map';
    }

    return typeof v;
  }
}
