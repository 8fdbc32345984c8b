// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../api/storage-backend.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * Reads environment variables verbatim. Keys are variable names.
 */
export class EnvironmentStorageBackend implements StorageBackend {
  public constructor(private readonly environment: NodeJS.ProcessEnv = process.env) {}

  public async list(): Promise<string[]> {
    return Object.keys(this.environment).filter(key => this.environment[key] !== undefined);
  }

  public async readBytes(key: string): Promise<Uint8Array> {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null, undefined, or empty');
    }

    const value: string | undefined = this.environment[key];
    if (value === undefined) {
      throw new StorageBackendError(`key not found: ${key}`);
    }

    return new Uint8Array(Buffer.from(value, 'utf8'));
  }
}
