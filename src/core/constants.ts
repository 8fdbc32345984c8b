// SPDX-License-Identifier: Apache-2.0

// -------------------- logging ------------------------------------------------------------------------------------
export const BINDER_LOG_LEVEL: string = process.env.BINDER_LOG_LEVEL || 'info';
export const BINDER_LOG_FILE: string = process.env.BINDER_LOG_FILE || '';

// -------------------- configuration sources ----------------------------------------------------------------------
export const BINDER_CONFIG_ENV_VARIABLE: string = 'BINDER_CONFIG';
export const KEY_SEPARATOR: string = ':';

export const MEMORY_SOURCE_ORDINAL: number = 100;
export const STACK_FILE_SOURCE_ORDINAL: number = 200;
export const ENVIRONMENT_SOURCE_ORDINAL: number = 300;
