// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {v4 as uuidv4} from 'uuid';
import {type DeferredEngine, type DeferredOptions} from './deferred-engine.js';
import {type DeferredKind, type DeferredValueTypes} from './deferred-kind.js';
import {
  type DeferredBool,
  type DeferredFloat,
  type DeferredHandle,
  type DeferredInt,
  type DeferredString,
  type DeferredValue,
  type PendingValue,
} from './deferred-value.js';
import {Deferred} from './deferred.js';
import {DeferredResolutionError} from './deferred-resolution-error.js';

interface RegisteredValue {
  readonly kind: DeferredKind;
  readonly value: string | boolean | number;
  readonly secret: boolean;
}

/**
 * Keeps registered values in process, keyed by handle id. Stands in for the orchestration engine when programs and
 * tests run without one. Values stay registered until they are released.
 */
@injectable()
export class InMemoryDeferredEngine implements DeferredEngine {
  private readonly registry: Map<string, RegisteredValue> = new Map<string, RegisteredValue>();

  public register<K extends DeferredKind>(
    kind: K,
    value: DeferredValueTypes[K],
    options: DeferredOptions = {secret: false},
  ): PendingValue<K> {
    const handle: DeferredHandle = Object.freeze({id: uuidv4()});
    this.registry.set(handle.id, {kind, value, secret: options.secret});
    return Deferred.pending(kind, handle, options.secret);
  }

  public get size(): number {
    return this.registry.size;
  }

  public isSecret(deferred: DeferredValue): boolean {
    if (deferred.state === 'literal') {
      return false;
    }

    return this.lookup(deferred).secret;
  }

  public resolve(deferred: DeferredString): Promise<string>;
  public resolve(deferred: DeferredBool): Promise<boolean>;
  public resolve(deferred: DeferredInt | DeferredFloat): Promise<number>;
  public async resolve(deferred: DeferredValue): Promise<string | boolean | number> {
    if (deferred.state === 'literal') {
      return deferred.value;
    }

    return this.lookup(deferred).value;
  }

  /**
   * Forgets the value behind a handle. Resolving the handle afterwards fails.
   *
   * @returns false when the handle was not registered.
   */
  public release(deferred: PendingValue): boolean {
    return this.registry.delete(deferred.handle.id);
  }

  private lookup(deferred: PendingValue): RegisteredValue {
    const registered: RegisteredValue | undefined = this.registry.get(deferred.handle.id);
    if (!registered) {
      throw new DeferredResolutionError(`Unknown deferred handle [ id = '${deferred.handle.id}' ]`);
    }

    if (registered.kind !== deferred.kind) {
      throw new DeferredResolutionError(
        `Deferred handle kind mismatch [ id = '${deferred.handle.id}', expected = '${deferred.kind}', actual = '${registered.kind}' ]`,
      );
    }

    return registered;
  }
}
