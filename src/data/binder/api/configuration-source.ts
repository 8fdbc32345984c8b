// SPDX-License-Identifier: Apache-2.0

import {
  type DeferredBool,
  type DeferredFloat,
  type DeferredInt,
  type DeferredString,
} from '../../deferred/deferred-value.js';

/**
 * Returned by {@link ConfigurationSource.getJSONBlob} when no JSON was supplied for an optional field. Callers leave
 * the field untouched.
 */
export const EMPTY_BLOB: unique symbol = Symbol('EmptyBlob');

export type JsonBlob = string | typeof EMPTY_BLOB;

/**
 * Namespace scoped, typed access to configuration values.
 *
 * Required lookups throw {@link MissingConfigError} when the key is absent. Optional lookups return the zero value of
 * the type instead.
 */
export interface ConfigurationSource {
  readonly namespace: string;

  /**
   * The keys present in the namespace, without the namespace prefix.
   */
  keys(): Set<string>;

  getString(key: string, required: boolean): string;

  getBool(key: string, required: boolean): boolean;

  getInt(key: string, required: boolean): number;

  getFloat(key: string, required: boolean): number;

  /**
   * Never unwraps synchronously. A secret value comes back as a pending handle flagged secret.
   */
  getDeferredString(key: string, required: boolean, secret: boolean): DeferredString;

  getDeferredBool(key: string, required: boolean, secret: boolean): DeferredBool;

  getDeferredInt(key: string, required: boolean, secret: boolean): DeferredInt;

  getDeferredFloat(key: string, required: boolean, secret: boolean): DeferredFloat;

  /**
   * Returns the raw JSON text stored under the key.
   *
   * @param key - the key within the namespace.
   * @param required - whether the key must be present.
   * @param existingValue - the value the target field already holds; a non-zero value satisfies requiredness.
   * @returns the JSON text, or {@link EMPTY_BLOB} when nothing was supplied.
   */
  getJSONBlob(key: string, required: boolean, existingValue: unknown): JsonBlob;
}
