// SPDX-License-Identifier: Apache-2.0

/**
 * The capabilities a deferred value can carry.
 */
export enum DeferredKind {
  String = 'string',
  Bool = 'bool',
  Int = 'int',
  Float = 'float',
}

/**
 * Maps each deferred capability to the type of its literal value.
 */
export interface DeferredValueTypes {
  [DeferredKind.String]: string;
  [DeferredKind.Bool]: boolean;
  [DeferredKind.Int]: number;
  [DeferredKind.Float]: number;
}
