// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogFile: Symbol.for('LogFile'),
  BinderLogger: Symbol.for('BinderLogger'),
  KeyFormatter: Symbol.for('KeyFormatter'),
  DeferredEngine: Symbol.for('DeferredEngine'),
  FieldDescriptorResolver: Symbol.for('FieldDescriptorResolver'),
  ScalarBinder: Symbol.for('ScalarBinder'),
  StructuralBinder: Symbol.for('StructuralBinder'),
  ConfigBinder: Symbol.for('ConfigBinder'),
  DisplaySerializer: Symbol.for('DisplaySerializer'),
};
