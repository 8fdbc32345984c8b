// SPDX-License-Identifier: Apache-2.0

import {BindingMetadata} from './binding-metadata.js';

/**
 * Names the configuration key of a property. Takes precedence over {@link DataKey} and {@link SecretKey}.
 */
export function ConfigKey(name: string): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    BindingMetadata.record(target, propertyKey, {configKey: name});
  };
}

/**
 * Names the key of a property in configuration, in JSON blobs and in display output.
 */
export function DataKey(name: string): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    BindingMetadata.record(target, propertyKey, {dataKey: name});
  };
}

/**
 * Names the configuration key of a secret property. The property must be a deferred field; its value is handed to the
 * deferred engine and only the handle is stored.
 */
export function SecretKey(name: string): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    BindingMetadata.record(target, propertyKey, {secretKey: name});
  };
}

/**
 * Fails the bind when the key is absent and the property does not already hold a value.
 */
export function Required(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    BindingMetadata.record(target, propertyKey, {required: true});
  };
}
