// SPDX-License-Identifier: Apache-2.0

import {BindingMetadata} from './binding-metadata.js';
import {type FieldTags} from '../api/field-descriptor.js';
import {FieldKind} from '../api/field-kind.js';
import {type DeferredKind} from '../../deferred/deferred-kind.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

function kind(tags: FieldTags): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    BindingMetadata.record(target, propertyKey, tags);
  };
}

export function BoolField(): PropertyDecorator {
  return kind({kind: FieldKind.Bool});
}

/**
 * A number field that only holds integers. JSON numbers are truncated toward zero.
 */
export function IntField(): PropertyDecorator {
  return kind({kind: FieldKind.Int});
}

export function FloatField(): PropertyDecorator {
  return kind({kind: FieldKind.Float});
}

export function StringField(): PropertyDecorator {
  return kind({kind: FieldKind.String});
}

/**
 * A `Map` filled from a JSON object. Entries are merged into the existing map.
 */
export function MapField(): PropertyDecorator {
  return kind({kind: FieldKind.Map});
}

/**
 * A nested object filled in place from a JSON object.
 */
export function StructField<T extends object>(type: () => ClassConstructor<T>): PropertyDecorator {
  return kind({kind: FieldKind.Struct, elementType: type});
}

/**
 * An optional nested value. It is allocated when absent; a JSON object fills an instance of the type, a JSON array
 * appends instances of the type, and a scalar is assigned as is.
 */
export function ReferenceField<T extends object>(type: () => ClassConstructor<T>): PropertyDecorator {
  return kind({kind: FieldKind.Reference, elementType: type});
}

/**
 * An array of nested objects. Elements bound from JSON are appended after the existing ones.
 */
export function SliceField<T extends object>(type: () => ClassConstructor<T>): PropertyDecorator {
  return kind({kind: FieldKind.Slice, elementType: type});
}

/**
 * A field holding a deferred value of the given capability.
 */
export function DeferredField(deferredKind: DeferredKind): PropertyDecorator {
  return kind({kind: FieldKind.Deferred, deferredKind});
}
