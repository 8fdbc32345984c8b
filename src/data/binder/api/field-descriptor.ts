// SPDX-License-Identifier: Apache-2.0

import {type FieldKind} from './field-kind.js';
import {type DeferredKind} from '../../deferred/deferred-kind.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

/**
 * The tags recorded by the binding decorators for a single property.
 */
export interface FieldTags {
  configKey?: string;
  dataKey?: string;
  secretKey?: string;
  required?: boolean;
  kind?: FieldKind;
  elementType?: () => ClassConstructor<object>;
  deferredKind?: DeferredKind;
}

/**
 * Everything the binder needs to know about one property of a bind target.
 */
export interface FieldDescriptor {
  readonly propertyKey: string;

  /**
   * The configuration key, taken from the config tag, then the data tag, then the secret tag.
   */
  readonly sourceFieldName: string;

  /**
   * The key used inside JSON blobs. Only config and data tags apply there.
   */
  readonly jsonFieldName?: string;

  /**
   * The display key, taken from the data tag, else the property name.
   */
  readonly displayName: string;

  readonly required: boolean;
  readonly isSecret: boolean;

  /**
   * Undefined when the property's type is not one of the supported kinds.
   */
  readonly kind?: FieldKind;

  /**
   * What the property was declared as, used in error messages.
   */
  readonly declaredType: string;

  readonly elementType?: () => ClassConstructor<object>;
  readonly deferredKind?: DeferredKind;
}
