// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {Deferred} from '../../data/deferred/deferred.js';

/**
 * Zero values stand for "not provided": `undefined`, `null`, `''`, `0`, `false`, empty collections, literal deferred
 * values wrapping a zero, and objects whose own values are all zero. A pending deferred value is never zero. An object
 * reached again through a cycle adds nothing to the result.
 */
export class ZeroValue {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  public static isZero(value: unknown): boolean {
    return ZeroValue.isZeroWithin(value, new WeakSet<object>());
  }

  private static isZeroWithin(value: unknown, visited: WeakSet<object>): boolean {
    if (value === undefined || value === null) {
      return true;
    }

    switch (typeof value) {
      case 'string': {
        return value.length === 0;
      }
      case 'number': {
        return value === 0;
      }
      case 'boolean': {
        return !value;
      }
      case 'bigint': {
        return value === BigInt(0);
      }
      case 'object': {
        break;
      }
      default: {
        return false;
      }
    }

    if (Deferred.isDeferred(value)) {
      return value.state === 'literal' && ZeroValue.isZeroWithin(value.value, visited);
    }

    if (visited.has(value)) {
      return true;
    }
    visited.add(value);

    if (Array.isArray(value)) {
      return value.length === 0;
    }

    if (value instanceof Map || value instanceof Set) {
      return value.size === 0;
    }

    return Object.values(value).every(v => ZeroValue.isZeroWithin(v, visited));
  }
}
