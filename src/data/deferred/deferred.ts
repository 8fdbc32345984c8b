// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {DeferredKind, type DeferredValueTypes} from './deferred-kind.js';
import {
  type DeferredHandle,
  type DeferredValue,
  type LiteralValue,
  type PendingValue,
} from './deferred-value.js';

/**
 * Factories and type guards for {@link DeferredValue} instances.
 */
export class Deferred {
  private static readonly PLACEHOLDERS: Record<DeferredKind, string> = {
    [DeferredKind.String]: '[StringOutput]',
    [DeferredKind.Bool]: '[BoolOutput]',
    [DeferredKind.Int]: '[IntOutput]',
    [DeferredKind.Float]: '[Float64Output]',
  };

  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  public static literal<K extends DeferredKind>(kind: K, value: DeferredValueTypes[K]): LiteralValue<K> {
    const literal: LiteralValue<K> = {state: 'literal', kind, secret: false, value};
    return Object.freeze(literal);
  }

  public static pending<K extends DeferredKind>(kind: K, handle: DeferredHandle, secret: boolean): PendingValue<K> {
    const pending: PendingValue<K> = {state: 'pending', kind, secret, handle};
    return Object.freeze(pending);
  }

  public static string(value: string): LiteralValue<DeferredKind.String> {
    return Deferred.literal(DeferredKind.String, value);
  }

  public static bool(value: boolean): LiteralValue<DeferredKind.Bool> {
    return Deferred.literal(DeferredKind.Bool, value);
  }

  public static int(value: number): LiteralValue<DeferredKind.Int> {
    return Deferred.literal(DeferredKind.Int, Math.trunc(value));
  }

  public static float(value: number): LiteralValue<DeferredKind.Float> {
    return Deferred.literal(DeferredKind.Float, value);
  }

  public static isKind(value: unknown): value is DeferredKind {
    switch (value) {
      case DeferredKind.String:
      case DeferredKind.Bool:
      case DeferredKind.Int:
      case DeferredKind.Float: {
        return true;
      }
      default: {
        return false;
      }
    }
  }

  public static isDeferred(value: unknown): value is DeferredValue {
    if (typeof value !== 'object' || value === null) {
      return false;
    }

    if (!('state' in value) || !('kind' in value) || !Deferred.isKind(value.kind)) {
      return false;
    }

    return (value.state === 'literal' && 'value' in value) || (value.state === 'pending' && 'handle' in value);
  }

  public static isLiteral<K extends DeferredKind>(value: unknown, kind: K): value is LiteralValue<K> {
    return Deferred.isDeferred(value) && value.state === 'literal' && value.kind === kind;
  }

  public static isPending(value: unknown): value is PendingValue {
    return Deferred.isDeferred(value) && value.state === 'pending';
  }

  /**
   * The fixed token shown in place of a deferred value of the given kind.
   */
  public static placeholder(kind: DeferredKind): string {
    return Deferred.PLACEHOLDERS[kind];
  }
}
