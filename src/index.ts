// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export {BinderError} from './core/errors/binder-error.js';
export {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
export {UnsupportedOperationError} from './core/errors/unsupported-operation-error.js';
export {type BinderLogger} from './core/logging/binder-logger.js';
export {BinderWinstonLogger} from './core/logging/binder-winston-logger.js';
export {Container} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';

export {DeferredKind, type DeferredValueTypes} from './data/deferred/deferred-kind.js';
export {
  type DeferredBool,
  type DeferredFloat,
  type DeferredHandle,
  type DeferredInt,
  type DeferredString,
  type DeferredValue,
  type LiteralValue,
  type PendingValue,
} from './data/deferred/deferred-value.js';
export {Deferred} from './data/deferred/deferred.js';
export {type DeferredEngine, type DeferredOptions} from './data/deferred/deferred-engine.js';
export {DeferredResolutionError} from './data/deferred/deferred-resolution-error.js';
export {InMemoryDeferredEngine} from './data/deferred/in-memory-deferred-engine.js';

export {type KeyFormatter} from './data/key/key-formatter.js';
export {ConfigKeyFormatter} from './data/key/config-key-formatter.js';
export {Prefix} from './data/key/prefix.js';

export {type Config} from './data/configuration/api/config.js';
export {type ConfigBuilder} from './data/configuration/api/config-builder.js';
export {ConfigurationError} from './data/configuration/api/configuration-error.js';
export {MissingConfigError} from './data/configuration/api/missing-config-error.js';
export {type ConfigSource} from './data/configuration/spi/config-source.js';
export {LayeredConfigBuilder} from './data/configuration/impl/layered-config-builder.js';
export {LayeredConfig} from './data/configuration/impl/layered-config.js';
export {MemoryConfigSource} from './data/configuration/impl/memory-config-source.js';
export {EnvironmentConfigSource} from './data/configuration/impl/environment-config-source.js';
export {StackFileConfigSource} from './data/configuration/impl/stack-file-config-source.js';
export {NamespacedConfigurationSource} from './data/configuration/impl/namespaced-configuration-source.js';

export {
  type ConfigurationSource,
  EMPTY_BLOB,
  type JsonBlob,
} from './data/binder/api/configuration-source.js';
export {FieldKind} from './data/binder/api/field-kind.js';
export {type FieldDescriptor, type FieldTags} from './data/binder/api/field-descriptor.js';
export {BindingError} from './data/binder/api/binding-error.js';
export {SecretOnNonDeferredFieldError} from './data/binder/api/secret-on-non-deferred-field-error.js';
export {TypeMismatchError} from './data/binder/api/type-mismatch-error.js';
export {UnsupportedFieldTypeError} from './data/binder/api/unsupported-field-type-error.js';
export {ConfigKey, DataKey, Required, SecretKey} from './data/binder/decorators/field-tags.js';
export {
  BoolField,
  DeferredField,
  FloatField,
  IntField,
  MapField,
  ReferenceField,
  SliceField,
  StringField,
  StructField,
} from './data/binder/decorators/field-kinds.js';
export {FieldDescriptorResolver} from './data/binder/impl/field-descriptor-resolver.js';
export {ScalarBinder} from './data/binder/impl/scalar-binder.js';
export {StructuralBinder} from './data/binder/impl/structural-binder.js';
export {ConfigBinder} from './data/binder/impl/config-binder.js';
export {DisplaySerializer} from './data/binder/impl/display-serializer.js';
