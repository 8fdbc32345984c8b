// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ConfigurationSource} from '../api/configuration-source.js';
import {type FieldDescriptor} from '../api/field-descriptor.js';
import {type FieldDescriptorResolver} from './field-descriptor-resolver.js';
import {FieldKind} from '../api/field-kind.js';
import {SecretOnNonDeferredFieldError} from '../api/secret-on-non-deferred-field-error.js';
import {TypeMismatchError} from '../api/type-mismatch-error.js';
import {UnsupportedFieldTypeError} from '../api/unsupported-field-type-error.js';
import {Deferred} from '../../deferred/deferred.js';
import {DeferredKind} from '../../deferred/deferred-kind.js';
import {type DeferredValue} from '../../deferred/deferred-value.js';
import {type BinderLogger} from '../../../core/logging/binder-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';

/**
 * Fills primitive and deferred fields from the typed accessors of a {@link ConfigurationSource}.
 *
 * Values already held by the target act as defaults: a zero read never overwrites them and they satisfy requiredness.
 */
@injectable()
export class ScalarBinder {
  private readonly resolver: FieldDescriptorResolver;
  private readonly logger: BinderLogger;

  public constructor(
    @inject(InjectTokens.FieldDescriptorResolver) resolver?: FieldDescriptorResolver,
    @inject(InjectTokens.BinderLogger) logger?: BinderLogger,
  ) {
    this.resolver = patchInject(resolver, InjectTokens.FieldDescriptorResolver, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.BinderLogger, this.constructor.name);
  }

  public bind(source: ConfigurationSource, target: object, descriptor: FieldDescriptor): void {
    const name: string = descriptor.sourceFieldName;
    const current: unknown = Reflect.get(target, descriptor.propertyKey);
    const required: boolean = this.resolver.isRequired(descriptor, current);

    this.logger.debug(`Binding scalar field [ field = '${name}', kind = '${descriptor.declaredType}' ]`);

    switch (descriptor.kind) {
      case FieldKind.Bool: {
        const value: boolean = source.getBool(name, required);
        this.assertNotSecret(descriptor);
        if (value) {
          Reflect.set(target, descriptor.propertyKey, value);
        }
        return;
      }
      case FieldKind.Int: {
        const value: number = source.getInt(name, required);
        this.assertNotSecret(descriptor);
        if (value !== 0) {
          Reflect.set(target, descriptor.propertyKey, value);
        }
        return;
      }
      case FieldKind.Float: {
        const value: number = source.getFloat(name, required);
        this.assertNotSecret(descriptor);
        if (value !== 0) {
          Reflect.set(target, descriptor.propertyKey, value);
        }
        return;
      }
      case FieldKind.String: {
        const value: string = source.getString(name, required);
        this.assertNotSecret(descriptor);
        if (value !== '') {
          Reflect.set(target, descriptor.propertyKey, value);
        }
        return;
      }
      case FieldKind.Deferred: {
        this.bindDeferred(source, target, descriptor, current, required);
        return;
      }
      default: {
        throw new IllegalArgumentError(`field is not a scalar field [ field = '${name}' ]`, descriptor.declaredType);
      }
    }
  }

  private bindDeferred(
    source: ConfigurationSource,
    target: object,
    descriptor: FieldDescriptor,
    current: unknown,
    required: boolean,
  ): void {
    const name: string = descriptor.sourceFieldName;
    const kind: DeferredKind | undefined = descriptor.deferredKind;
    if (kind === undefined) {
      throw new UnsupportedFieldTypeError(name, descriptor.declaredType);
    }

    if (current !== undefined && current !== null && !(Deferred.isDeferred(current) && current.kind === kind)) {
      const actual: string = Deferred.isDeferred(current) ? `deferred<${current.kind}>` : ReflectAssist.shapeOf(current);
      throw new TypeMismatchError(name, `deferred<${kind}>`, actual);
    }

    if (descriptor.isSecret) {
      Reflect.set(target, descriptor.propertyKey, this.readSecret(source, kind, name, required));
      return;
    }

    const literal: DeferredValue | undefined = this.readLiteral(source, kind, name, required);
    if (literal !== undefined && !Deferred.isPending(current)) {
      Reflect.set(target, descriptor.propertyKey, literal);
    }
  }

  private readSecret(source: ConfigurationSource, kind: DeferredKind, name: string, required: boolean): DeferredValue {
    switch (kind) {
      case DeferredKind.String: {
        return source.getDeferredString(name, required, true);
      }
      case DeferredKind.Bool: {
        return source.getDeferredBool(name, required, true);
      }
      case DeferredKind.Int: {
        return source.getDeferredInt(name, required, true);
      }
      case DeferredKind.Float: {
        return source.getDeferredFloat(name, required, true);
      }
    }
  }

  /**
   * Reads the plain value behind a non secret deferred field. Zero reads come back as undefined.
   */
  private readLiteral(
    source: ConfigurationSource,
    kind: DeferredKind,
    name: string,
    required: boolean,
  ): DeferredValue | undefined {
    switch (kind) {
      case DeferredKind.String: {
        const value: string = source.getString(name, required);
        return value === '' ? undefined : Deferred.string(value);
      }
      case DeferredKind.Bool: {
        const value: boolean = source.getBool(name, required);
        return value ? Deferred.bool(value) : undefined;
      }
      case DeferredKind.Int: {
        const value: number = source.getInt(name, required);
        return value === 0 ? undefined : Deferred.int(value);
      }
      case DeferredKind.Float: {
        const value: number = source.getFloat(name, required);
        return value === 0 ? undefined : Deferred.float(value);
      }
    }
  }

  private assertNotSecret(descriptor: FieldDescriptor): void {
    if (descriptor.isSecret) {
      throw new SecretOnNonDeferredFieldError(descriptor.sourceFieldName, descriptor.declaredType);
    }
  }
}
