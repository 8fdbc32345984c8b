// SPDX-License-Identifier: Apache-2.0

/**
 * The closed set of field kinds the binder knows how to fill.
 */
export enum FieldKind {
  Bool = 'bool',
  Int = 'int',
  Float = 'float',
  String = 'string',
  Map = 'map',
  Struct = 'struct',
  /**
   * An optional reference to a nested object, an array of nested objects or a scalar. Allocated on first bind and
   * reused afterwards.
   */
  Reference = 'reference',
  Slice = 'slice',
  Deferred = 'deferred',
}
