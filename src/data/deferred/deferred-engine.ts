// SPDX-License-Identifier: Apache-2.0

import {type DeferredKind, type DeferredValueTypes} from './deferred-kind.js';
import {type PendingValue} from './deferred-value.js';

export interface DeferredOptions {
  /**
   * Secret values must never be logged or serialized in cleartext by any consumer of the handle.
   */
  readonly secret: boolean;
}

/**
 * The engine that owns deferred values. Configuration sources hand values to it and receive opaque handles back; the
 * binder only ever stores those handles.
 */
export interface DeferredEngine {
  /**
   * Registers a value with the engine and returns a pending handle for it.
   *
   * @param kind - the capability of the value.
   * @param value - the value the handle resolves to.
   * @param options - whether the value is secret.
   */
  register<K extends DeferredKind>(kind: K, value: DeferredValueTypes[K], options: DeferredOptions): PendingValue<K>;
}
