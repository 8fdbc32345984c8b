// SPDX-License-Identifier: Apache-2.0

import {type ConfigBuilder} from '../api/config-builder.js';
import {type ConfigSource} from '../spi/config-source.js';
import {type Config} from '../api/config.js';
import {EnvironmentConfigSource} from './environment-config-source.js';
import {StackFileConfigSource} from './stack-file-config-source.js';
import {LayeredConfig} from './layered-config.js';
import {EnvironmentStorageBackend} from '../../backend/impl/environment-storage-backend.js';
import {FileStorageBackend} from '../../backend/impl/file-storage-backend.js';

export class LayeredConfigBuilder implements ConfigBuilder {
  private readonly sources: ConfigSource[] = [];

  public withEnvironment(variable?: string): ConfigBuilder {
    this.sources.push(new EnvironmentConfigSource(new EnvironmentStorageBackend(), variable));
    return this;
  }

  public withStackFile(directory: string, fileName: string): ConfigBuilder {
    this.sources.push(new StackFileConfigSource(new FileStorageBackend(directory), fileName));
    return this;
  }

  public withSources(...sources: ConfigSource[]): ConfigBuilder {
    this.sources.push(...sources);
    return this;
  }

  public build(): Config {
    return new LayeredConfig(this.sources);
  }
}
