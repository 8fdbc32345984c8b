// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ConfigurationSource} from '../api/configuration-source.js';
import {type FieldDescriptor} from '../api/field-descriptor.js';
import {FieldKind} from '../api/field-kind.js';
import {UnsupportedFieldTypeError} from '../api/unsupported-field-type-error.js';
import {type FieldDescriptorResolver} from './field-descriptor-resolver.js';
import {type ScalarBinder} from './scalar-binder.js';
import {type StructuralBinder} from './structural-binder.js';
import {type Config} from '../../configuration/api/config.js';
import {NamespacedConfigurationSource} from '../../configuration/impl/namespaced-configuration-source.js';
import {type DeferredEngine} from '../../deferred/deferred-engine.js';
import {type KeyFormatter} from '../../key/key-formatter.js';
import {type BinderLogger} from '../../../core/logging/binder-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

type FieldHandler = (source: ConfigurationSource, target: object, descriptor: FieldDescriptor) => void;

/**
 * Populates an object graph from a namespaced configuration source.
 *
 * Every tagged property of the target is visited in declaration order. Primitive and deferred fields are read through
 * the typed accessors of the source; maps, nested objects, references and arrays are read as JSON blobs and merged into
 * whatever the target already holds. The first failure aborts the bind and fields set before it keep their values.
 */
@injectable()
export class ConfigBinder {
  private readonly resolver: FieldDescriptorResolver;
  private readonly scalarBinder: ScalarBinder;
  private readonly structuralBinder: StructuralBinder;
  private readonly engine: DeferredEngine;
  private readonly formatter: KeyFormatter;
  private readonly logger: BinderLogger;

  private readonly handlers: Record<FieldKind, FieldHandler>;

  public constructor(
    @inject(InjectTokens.FieldDescriptorResolver) resolver?: FieldDescriptorResolver,
    @inject(InjectTokens.ScalarBinder) scalarBinder?: ScalarBinder,
    @inject(InjectTokens.StructuralBinder) structuralBinder?: StructuralBinder,
    @inject(InjectTokens.DeferredEngine) engine?: DeferredEngine,
    @inject(InjectTokens.KeyFormatter) formatter?: KeyFormatter,
    @inject(InjectTokens.BinderLogger) logger?: BinderLogger,
  ) {
    this.resolver = patchInject(resolver, InjectTokens.FieldDescriptorResolver, this.constructor.name);
    this.scalarBinder = patchInject(scalarBinder, InjectTokens.ScalarBinder, this.constructor.name);
    this.structuralBinder = patchInject(structuralBinder, InjectTokens.StructuralBinder, this.constructor.name);
    this.engine = patchInject(engine, InjectTokens.DeferredEngine, this.constructor.name);
    this.formatter = patchInject(formatter, InjectTokens.KeyFormatter, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.BinderLogger, this.constructor.name);

    const scalar: FieldHandler = (source, target, descriptor): void =>
      this.scalarBinder.bind(source, target, descriptor);
    const structural: FieldHandler = (source, target, descriptor): void =>
      this.structuralBinder.bindBlob(source, target, descriptor);

    this.handlers = {
      [FieldKind.Bool]: scalar,
      [FieldKind.Int]: scalar,
      [FieldKind.Float]: scalar,
      [FieldKind.String]: scalar,
      [FieldKind.Deferred]: scalar,
      [FieldKind.Map]: structural,
      [FieldKind.Struct]: structural,
      [FieldKind.Reference]: structural,
      [FieldKind.Slice]: structural,
    };
  }

  /**
   * Reads the namespace of a layered configuration into the target.
   */
  public bind<T extends object>(config: Config, namespace: string, target: T): T {
    return this.bindFromSource(new NamespacedConfigurationSource(config, namespace, this.engine, this.formatter), target);
  }

  /**
   * Fills the tagged properties of the target from the source and returns the same target.
   *
   * @throws MissingConfigError when a required value is absent and the field holds no default.
   * @throws UnsupportedFieldTypeError when a tagged property has no supported kind.
   * @throws SecretOnNonDeferredFieldError when a secret tag is placed on a field that is not deferred.
   * @throws TypeMismatchError when JSON does not match the shape of the field.
   */
  public bindFromSource<T extends object>(source: ConfigurationSource, target: T): T {
    if (typeof target !== 'object' || target === null || Array.isArray(target)) {
      throw new IllegalArgumentError('bind target must be an object', target);
    }

    this.logger.nextTraceId();
    this.logger.debug(`Binding configuration [ namespace = '${source.namespace}', target = '${target.constructor.name}' ]`);

    const consumed: Set<string> = new Set<string>();
    for (const descriptor of this.resolver.describe(target)) {
      consumed.add(descriptor.sourceFieldName);
      if (descriptor.kind === undefined) {
        throw new UnsupportedFieldTypeError(descriptor.sourceFieldName, descriptor.declaredType);
      }

      this.handlers[descriptor.kind](source, target, descriptor);
    }

    const unused: string[] = [...source.keys()].filter((key: string): boolean => !consumed.has(key));
    if (unused.length > 0) {
      this.logger.warn(
        `Configuration keys were not bound to any field [ namespace = '${source.namespace}', keys = '${unused.join(', ')}' ]`,
      );
    }

    return target;
  }
}
