// SPDX-License-Identifier: Apache-2.0

import {type DeferredKind, type DeferredValueTypes} from './deferred-kind.js';

/**
 * An opaque reference to a value that an external engine resolves later.
 */
export interface DeferredHandle {
  readonly id: string;
}

/**
 * A deferred value whose literal is already known.
 */
export interface LiteralValue<K extends DeferredKind = DeferredKind> {
  readonly state: 'literal';
  readonly kind: K;
  readonly secret: false;
  readonly value: DeferredValueTypes[K];
}

/**
 * A deferred value that only carries a handle. The literal is owned by the engine that issued the handle.
 */
export interface PendingValue<K extends DeferredKind = DeferredKind> {
  readonly state: 'pending';
  readonly kind: K;
  readonly secret: boolean;
  readonly handle: DeferredHandle;
}

export type DeferredValue<K extends DeferredKind = DeferredKind> = LiteralValue<K> | PendingValue<K>;

export type DeferredString = DeferredValue<DeferredKind.String>;
export type DeferredBool = DeferredValue<DeferredKind.Bool>;
export type DeferredInt = DeferredValue<DeferredKind.Int>;
export type DeferredFloat = DeferredValue<DeferredKind.Float>;
