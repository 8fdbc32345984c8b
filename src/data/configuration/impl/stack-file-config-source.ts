// SPDX-License-Identifier: Apache-2.0

import {parse} from 'yaml';
import {plainToInstance} from 'class-transformer';
import {type StorageBackend} from '../../backend/api/storage-backend.js';
import {LayeredConfigSource} from './layered-config-source.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {StackFile} from '../model/stack-file.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {STACK_FILE_SOURCE_ORDINAL} from '../../../core/constants.js';

/**
 * A configuration source that reads the `config` mapping of a YAML stack file:
 *
 * ```yaml
 * config:
 *   pg:database: app
 *   pg:provider:
 *     host: db.internal
 *     port: 5432
 * ```
 */
export class StackFileConfigSource extends LayeredConfigSource {
  public constructor(
    private readonly backend: StorageBackend,
    public readonly fileName: string,
  ) {
    super();
  }

  public get name(): string {
    return `StackFileConfigSource:${this.fileName}`;
  }

  public get ordinal(): number {
    return STACK_FILE_SOURCE_ORDINAL;
  }

  public async load(): Promise<void> {
    let document: unknown;
    try {
      const bytes: Uint8Array = await this.backend.readBytes(this.fileName);
      document = parse(Buffer.from(bytes).toString('utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read stack file: ${this.fileName}`, error);
    }

    if (document === null || document === undefined) {
      this.replace([]);
      return;
    }

    if (!ReflectAssist.isJsonObject(document)) {
      throw new ConfigurationError(`Stack file must hold a mapping [ file = '${this.fileName}' ]`);
    }

    const stackFile: StackFile = plainToInstance(StackFile, document, {exposeUnsetFields: false});
    if (!ReflectAssist.isJsonObject(stackFile.config)) {
      throw new ConfigurationError(`Stack file config must be a mapping [ file = '${this.fileName}' ]`);
    }

    this.replace(Object.entries(stackFile.config));
  }
}
