// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ConfigurationSource, EMPTY_BLOB, type JsonBlob} from '../api/configuration-source.js';
import {type FieldDescriptor} from '../api/field-descriptor.js';
import {FieldKind} from '../api/field-kind.js';
import {SecretOnNonDeferredFieldError} from '../api/secret-on-non-deferred-field-error.js';
import {TypeMismatchError} from '../api/type-mismatch-error.js';
import {UnsupportedFieldTypeError} from '../api/unsupported-field-type-error.js';
import {type FieldDescriptorResolver} from './field-descriptor-resolver.js';
import {Deferred} from '../../deferred/deferred.js';
import {DeferredKind} from '../../deferred/deferred-kind.js';
import {type DeferredValue} from '../../deferred/deferred-value.js';
import {type BinderLogger} from '../../../core/logging/binder-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';

/**
 * Merges parsed JSON into an existing object graph.
 *
 * Objects are filled in place, maps are merged and arrays are appended to: binding `n` elements and then `m` elements
 * leaves `n + m` elements with the first `n` untouched.
 */
@injectable()
export class StructuralBinder {
  private readonly resolver: FieldDescriptorResolver;
  private readonly logger: BinderLogger;

  public constructor(
    @inject(InjectTokens.FieldDescriptorResolver) resolver?: FieldDescriptorResolver,
    @inject(InjectTokens.BinderLogger) logger?: BinderLogger,
  ) {
    this.resolver = patchInject(resolver, InjectTokens.FieldDescriptorResolver, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.BinderLogger, this.constructor.name);
  }

  /**
   * Reads the JSON blob of a structural field and merges it into the field. An absent optional blob leaves the field
   * untouched.
   */
  public bindBlob(source: ConfigurationSource, target: object, descriptor: FieldDescriptor): void {
    const name: string = descriptor.sourceFieldName;
    if (descriptor.isSecret) {
      throw new SecretOnNonDeferredFieldError(name, descriptor.declaredType);
    }

    const current: unknown = Reflect.get(target, descriptor.propertyKey);
    const blob: JsonBlob = source.getJSONBlob(name, this.resolver.isRequired(descriptor, current), current);
    if (blob === EMPTY_BLOB) {
      this.logger.debug(`No JSON supplied, field left untouched [ field = '${name}' ]`);
      return;
    }

    this.logger.debug(`Binding structural field [ field = '${name}', kind = '${descriptor.declaredType}' ]`);
    this.bindField(StructuralBinder.parse(blob, name), target, descriptor, name);
  }

  /**
   * Parses JSON text and merges it into the target. A JSON object fills the target's tagged properties; a JSON array
   * is appended to a target array, creating elements of the given type.
   */
  public unmarshalJsonConfig(text: string, target: object, elementType?: ClassConstructor<object>): void {
    if (text.length === 0) {
      return;
    }

    const parsed: unknown = StructuralBinder.parse(text, '');
    if (Array.isArray(target)) {
      if (!Array.isArray(parsed)) {
        throw new TypeMismatchError('', 'array', ReflectAssist.shapeOf(parsed));
      }
      if (!elementType) {
        throw new IllegalArgumentError('elementType is required to bind a JSON array');
      }
      this.bindArray(parsed, target, elementType, '');
      return;
    }

    if (!ReflectAssist.isJsonObject(parsed)) {
      throw new TypeMismatchError('', 'object', ReflectAssist.shapeOf(parsed));
    }
    this.bindObject(parsed, target, '');
  }

  /**
   * Fills the tagged properties of the target from a JSON object. Keys that are absent or `null` are skipped.
   */
  public bindObject(dictionary: Record<string, unknown>, target: object, path: string): void {
    for (const descriptor of this.resolver.jsonFields(target)) {
      const key: string | undefined = descriptor.jsonFieldName;
      if (key === undefined || !Object.hasOwn(dictionary, key)) {
        continue;
      }

      const value: unknown = dictionary[key];
      if (value === null) {
        continue;
      }

      this.bindField(value, target, descriptor, StructuralBinder.child(path, key));
    }
  }

  /**
   * Appends the elements of a JSON array to the target. Each item must be a JSON object.
   */
  public bindArray(items: unknown[], target: unknown[], elementType: ClassConstructor<object>, path: string): void {
    const initialLength: number = target.length;
    for (const [index, item] of items.entries()) {
      const elementPath: string = `${path}[${index}]`;
      if (!ReflectAssist.isJsonObject(item)) {
        throw new TypeMismatchError(elementPath, 'object', ReflectAssist.shapeOf(item));
      }

      if (initialLength + index >= target.length) {
        target.push(new elementType());
      }

      const element: unknown = target[initialLength + index];
      if (typeof element !== 'object' || element === null) {
        throw new TypeMismatchError(elementPath, 'object', ReflectAssist.shapeOf(element));
      }
      this.bindObject(item, element, elementPath);
    }
  }

  private bindField(value: unknown, target: object, descriptor: FieldDescriptor, path: string): void {
    const key: string = descriptor.propertyKey;
    const current: unknown = Reflect.get(target, key);

    switch (descriptor.kind) {
      case FieldKind.Bool: {
        Reflect.set(target, key, StructuralBinder.expect(value, 'boolean', path));
        return;
      }
      case FieldKind.String: {
        Reflect.set(target, key, StructuralBinder.expect(value, 'string', path));
        return;
      }
      case FieldKind.Float: {
        Reflect.set(target, key, StructuralBinder.expect(value, 'number', path));
        return;
      }
      case FieldKind.Int: {
        Reflect.set(target, key, Math.trunc(StructuralBinder.expect(value, 'number', path)));
        return;
      }
      case FieldKind.Deferred: {
        this.bindDeferred(value, target, descriptor, current, path);
        return;
      }
      case FieldKind.Map: {
        if (!ReflectAssist.isJsonObject(value)) {
          throw new TypeMismatchError(path, 'object', ReflectAssist.shapeOf(value));
        }
        const map: Map<unknown, unknown> = current instanceof Map ? current : new Map<unknown, unknown>();
        for (const [entryKey, entryValue] of Object.entries(value)) {
          map.set(entryKey, entryValue);
        }
        Reflect.set(target, key, map);
        return;
      }
      case FieldKind.Struct: {
        if (!ReflectAssist.isJsonObject(value)) {
          throw new TypeMismatchError(path, 'object', ReflectAssist.shapeOf(value));
        }
        const instance: object = this.existingObject(current) ?? this.allocate(descriptor);
        this.bindObject(value, instance, path);
        Reflect.set(target, key, instance);
        return;
      }
      case FieldKind.Reference: {
        this.bindReference(value, target, descriptor, current, path);
        return;
      }
      case FieldKind.Slice: {
        if (!Array.isArray(value)) {
          throw new TypeMismatchError(path, 'array', ReflectAssist.shapeOf(value));
        }
        const items: unknown[] = Array.isArray(current) ? current : [];
        this.bindArray(value, items, this.elementTypeOf(descriptor), path);
        Reflect.set(target, key, items);
        return;
      }
      default: {
        throw new UnsupportedFieldTypeError(path, descriptor.declaredType);
      }
    }
  }

  private bindReference(
    value: unknown,
    target: object,
    descriptor: FieldDescriptor,
    current: unknown,
    path: string,
  ): void {
    const key: string = descriptor.propertyKey;
    if (ReflectAssist.isJsonObject(value)) {
      const instance: object = this.existingObject(current) ?? this.allocate(descriptor);
      this.bindObject(value, instance, path);
      Reflect.set(target, key, instance);
    } else if (Array.isArray(value)) {
      const items: unknown[] = Array.isArray(current) ? current : [];
      this.bindArray(value, items, this.elementTypeOf(descriptor), path);
      Reflect.set(target, key, items);
    } else {
      Reflect.set(target, key, value);
    }
  }

  private bindDeferred(
    value: unknown,
    target: object,
    descriptor: FieldDescriptor,
    current: unknown,
    path: string,
  ): void {
    const kind: DeferredKind | undefined = descriptor.deferredKind;
    if (kind === undefined) {
      throw new UnsupportedFieldTypeError(path, descriptor.declaredType);
    }

    if (Deferred.isPending(current)) {
      return;
    }

    if (current !== undefined && current !== null && !Deferred.isLiteral(current, kind)) {
      const actual: string = Deferred.isDeferred(current) ? `deferred<${current.kind}>` : ReflectAssist.shapeOf(current);
      throw new TypeMismatchError(path, `deferred<${kind}>`, actual);
    }

    Reflect.set(target, descriptor.propertyKey, StructuralBinder.literalOf(kind, value, path));
  }

  private existingObject(current: unknown): object | undefined {
    return typeof current === 'object' && current !== null && !Array.isArray(current) ? current : undefined;
  }

  private allocate(descriptor: FieldDescriptor): object {
    const elementType: ClassConstructor<object> = this.elementTypeOf(descriptor);
    return new elementType();
  }

  private elementTypeOf(descriptor: FieldDescriptor): ClassConstructor<object> {
    if (!descriptor.elementType) {
      throw new UnsupportedFieldTypeError(descriptor.sourceFieldName, descriptor.declaredType);
    }

    return descriptor.elementType();
  }

  private static literalOf(kind: DeferredKind, value: unknown, path: string): DeferredValue {
    switch (kind) {
      case DeferredKind.String: {
        return Deferred.string(StructuralBinder.expect(value, 'string', path));
      }
      case DeferredKind.Bool: {
        return Deferred.bool(StructuralBinder.expect(value, 'boolean', path));
      }
      case DeferredKind.Int: {
        return Deferred.int(StructuralBinder.expect(value, 'number', path));
      }
      case DeferredKind.Float: {
        return Deferred.float(StructuralBinder.expect(value, 'number', path));
      }
    }
  }

  private static expect(value: unknown, expected: 'string', path: string): string;
  private static expect(value: unknown, expected: 'number', path: string): number;
  private static expect(value: unknown, expected: 'boolean', path: string): boolean;
  private static expect(value: unknown, expected: 'string' | 'number' | 'boolean', path: string): string | number | boolean {
    if (expected === 'string' && typeof value === 'string') {
      return value;
    }
    if (expected === 'number' && typeof value === 'number') {
      return value;
    }
    if (expected === 'boolean' && typeof value === 'boolean') {
      return value;
    }

    throw new TypeMismatchError(path, expected, ReflectAssist.shapeOf(value));
  }

  private static parse(text: string, path: string): unknown {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new TypeMismatchError(path, 'json', 'malformed text', error);
    }
  }

  private static child(path: string, key: string): string {
    return path.length > 0 ? `${path}.${key}` : key;
  }
}
