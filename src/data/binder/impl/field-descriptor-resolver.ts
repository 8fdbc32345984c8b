// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type FieldDescriptor, type FieldTags} from '../api/field-descriptor.js';
import {FieldKind} from '../api/field-kind.js';
import {BindingMetadata} from '../decorators/binding-metadata.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {ZeroValue} from '../../../business/utils/zero-value.js';

/**
 * Turns the binding decorators of a class into {@link FieldDescriptor} lists. Descriptors are computed once per
 * prototype and reused for every bind of that class.
 */
@injectable()
export class FieldDescriptorResolver {
  private static readonly NO_FIELDS: readonly FieldDescriptor[] = Object.freeze([]);

  private readonly cache: WeakMap<object, readonly FieldDescriptor[]> = new WeakMap<object, readonly FieldDescriptor[]>();

  /**
   * Describes the tagged properties of the target's class. Untagged properties are not part of the result.
   */
  public describe(target: object): readonly FieldDescriptor[] {
    if (typeof target !== 'object' || target === null) {
      throw new IllegalArgumentError('target must be an object', target);
    }

    const prototype: unknown = Object.getPrototypeOf(target);
    if (typeof prototype !== 'object' || prototype === null) {
      return FieldDescriptorResolver.NO_FIELDS;
    }

    const cached: readonly FieldDescriptor[] | undefined = this.cache.get(prototype);
    if (cached) {
      return cached;
    }

    const descriptors: FieldDescriptor[] = [];
    for (const [propertyKey, tags] of BindingMetadata.tagsOf(prototype)) {
      const descriptor: FieldDescriptor | undefined = this.toDescriptor(prototype, propertyKey, tags);
      if (descriptor) {
        descriptors.push(descriptor);
      }
    }

    const frozen: readonly FieldDescriptor[] = Object.freeze(descriptors);
    this.cache.set(prototype, frozen);
    return frozen;
  }

  /**
   * The descriptors that can be filled from a JSON object. Secret tags do not name JSON keys.
   */
  public jsonFields(target: object): readonly FieldDescriptor[] {
    return this.describe(target).filter((descriptor: FieldDescriptor): boolean => descriptor.jsonFieldName !== undefined);
  }

  /**
   * A declared required field only has to be supplied when it does not already hold a value. A reference holds a value
   * as soon as it points at something, whatever the pointee contains.
   */
  public isRequired(descriptor: FieldDescriptor, currentValue: unknown): boolean {
    if (!descriptor.required) {
      return false;
    }

    if (descriptor.kind === FieldKind.Reference) {
      return currentValue === undefined || currentValue === null;
    }

    return ZeroValue.isZero(currentValue);
  }

  private toDescriptor(prototype: object, propertyKey: string, tags: FieldTags): FieldDescriptor | undefined {
    const sourceFieldName: string | undefined = tags.configKey ?? tags.dataKey ?? tags.secretKey;
    if (sourceFieldName === undefined) {
      return undefined;
    }

    const designType: unknown = BindingMetadata.designTypeOf(prototype, propertyKey);
    const kind: FieldKind | undefined = tags.kind ?? FieldDescriptorResolver.inferKind(designType);

    return Object.freeze({
      propertyKey,
      sourceFieldName,
      jsonFieldName: tags.configKey ?? tags.dataKey,
      displayName: tags.dataKey ?? propertyKey,
      required: tags.required === true,
      isSecret: tags.configKey === undefined && tags.dataKey === undefined && tags.secretKey !== undefined,
      kind,
      declaredType: kind ?? FieldDescriptorResolver.typeName(designType),
      elementType: tags.elementType,
      deferredKind: tags.deferredKind,
    });
  }

  private static inferKind(designType: unknown): FieldKind | undefined {
    switch (designType) {
      case String: {
        return FieldKind.String;
      }
      case Boolean: {
        return FieldKind.Bool;
      }
      case Number: {
        return FieldKind.Float;
      }
      case Map: {
        return FieldKind.Map;
      }
      default: {
        return undefined;
      }
    }
  }

  private static typeName(designType: unknown): string {
    return typeof designType === 'function' && designType.name ? designType.name : 'unknown';
  }
}
