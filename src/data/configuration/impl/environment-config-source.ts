// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../../backend/api/storage-backend.js';
import {EnvironmentStorageBackend} from '../../backend/impl/environment-storage-backend.js';
import {LayeredConfigSource} from './layered-config-source.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {BINDER_CONFIG_ENV_VARIABLE, ENVIRONMENT_SOURCE_ORDINAL} from '../../../core/constants.js';

/**
 * A configuration source that reads configuration data from the environment.
 *
 * <p>
 * A single variable holds a JSON object of fully qualified keys to values, e.g.
 * `BINDER_CONFIG='{"pg:database":"app","pg:provider":{"port":5432}}'`.
 * A missing variable yields an empty source.
 */
export class EnvironmentConfigSource extends LayeredConfigSource {
  public constructor(
    private readonly backend: StorageBackend = new EnvironmentStorageBackend(),
    private readonly variable: string = BINDER_CONFIG_ENV_VARIABLE,
  ) {
    super();
  }

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return ENVIRONMENT_SOURCE_ORDINAL;
  }

  public async load(): Promise<void> {
    const variables: string[] = await this.backend.list();
    if (!variables.includes(this.variable)) {
      this.replace([]);
      return;
    }

    let document: unknown;
    try {
      const bytes: Uint8Array = await this.backend.readBytes(this.variable);
      document = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read environment variable: ${this.variable}`, error);
    }

    if (!ReflectAssist.isJsonObject(document)) {
      throw new ConfigurationError(
        `Environment variable must hold a JSON object [ variable = '${this.variable}', actual = '${ReflectAssist.shapeOf(document)}' ]`,
      );
    }

    this.replace(Object.entries(document));
  }
}
