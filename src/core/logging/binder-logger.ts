// SPDX-License-Identifier: Apache-2.0

export interface BinderLogger {
  nextTraceId(): void;

  prepMeta(meta?: object): object;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;
}
