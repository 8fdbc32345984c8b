// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {type FieldTags} from '../api/field-descriptor.js';
import {UnsupportedOperationError} from '../../../core/errors/unsupported-operation-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

const FIELD_TAGS_KEY: symbol = Symbol.for('config-binder:field-tags');

/**
 * Stores the tags recorded by the binding decorators on the prototype of the decorated class.
 */
export class BindingMetadata {
  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * Merges tags into the entry of a property, creating it when needed.
   */
  public static record(prototype: object, propertyKey: string | symbol, tags: FieldTags): void {
    if (typeof propertyKey !== 'string') {
      throw new IllegalArgumentError('binding decorators only apply to string keyed properties', propertyKey.toString());
    }

    const own: Map<string, FieldTags> = BindingMetadata.ownTags(prototype);
    own.set(propertyKey, {...own.get(propertyKey), ...tags});
    Reflect.defineMetadata(FIELD_TAGS_KEY, own, prototype);
  }

  /**
   * Collects the tags of a prototype and its ancestors in declaration order, base class first.
   */
  public static tagsOf(prototype: object): Map<string, FieldTags> {
    const chain: object[] = [];
    for (
      let current: unknown = prototype;
      typeof current === 'object' && current !== null && current !== Object.prototype;
      current = Object.getPrototypeOf(current)
    ) {
      chain.unshift(current);
    }

    const tags: Map<string, FieldTags> = new Map<string, FieldTags>();
    for (const link of chain) {
      for (const [propertyKey, fieldTags] of BindingMetadata.ownTags(link)) {
        tags.set(propertyKey, {...tags.get(propertyKey), ...fieldTags});
      }
    }

    return tags;
  }

  /**
   * The type the compiler recorded for the property, when decorator metadata was emitted.
   */
  public static designTypeOf(prototype: object, propertyKey: string): unknown {
    const designType: unknown = Reflect.getOwnMetadata('design:type', prototype, propertyKey);
    return designType;
  }

  private static ownTags(prototype: object): Map<string, FieldTags> {
    const stored: unknown = Reflect.getOwnMetadata(FIELD_TAGS_KEY, prototype);
    return stored instanceof Map ? new Map<string, FieldTags>(stored) : new Map<string, FieldTags>();
  }
}
