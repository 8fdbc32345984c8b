// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {EnvironmentConfigSource} from '../../../../../src/data/configuration/impl/environment-config-source.js';
import {EnvironmentStorageBackend} from '../../../../../src/data/backend/impl/environment-storage-backend.js';
import {ConfigurationError} from '../../../../../src/data/configuration/api/configuration-error.js';

function sourceOf(environment: NodeJS.ProcessEnv, variable?: string): EnvironmentConfigSource {
  return new EnvironmentConfigSource(new EnvironmentStorageBackend(environment), variable);
}

describe('EnvironmentConfigSource', () => {
  it('should flatten the JSON object held by the variable', async () => {
    const source: EnvironmentConfigSource = sourceOf({
      BINDER_CONFIG: '{"pg:database":"app","pg:port":5432,"pg:provider":{"host":"db.internal"},"pg:unset":null}',
    });

    await source.load();

    expect(source.asString('pg:database')).to.equal('app');
    expect(source.asString('pg:port')).to.equal('5432');
    expect(source.asString('pg:provider')).to.equal('{"host":"db.internal"}');
    expect(source.asString('pg:unset')).to.be.null;
    expect(source.ordinal).to.equal(300);
  });

  it('should read a custom variable', async () => {
    const source: EnvironmentConfigSource = sourceOf({APP_CONFIG: '{"app:name":"demo"}'}, 'APP_CONFIG');

    await source.load();

    expect([...source.propertyNames()]).to.deep.equal(['app:name']);
  });

  it('should be empty when the variable is not set', async () => {
    const source: EnvironmentConfigSource = sourceOf({});

    await source.load();

    expect(source.properties().size).to.equal(0);
  });

  it('should reject malformed JSON', async () => {
    const source: EnvironmentConfigSource = sourceOf({BINDER_CONFIG: '{'});

    await expect(source.load()).to.be.rejectedWith(
      ConfigurationError,
      'Failed to read environment variable: BINDER_CONFIG',
    );
  });

  it('should reject JSON that is not an object', async () => {
    const source: EnvironmentConfigSource = sourceOf({BINDER_CONFIG: '["pg:database"]'});

    await expect(source.load()).to.be.rejectedWith(
      ConfigurationError,
      "Environment variable must hold a JSON object [ variable = 'BINDER_CONFIG', actual = 'array' ]",
    );
  });

  it('should keep the loaded values when a refresh fails', async () => {
    const environment: NodeJS.ProcessEnv = {BINDER_CONFIG: '{"pg:database":"app"}'};
    const source: EnvironmentConfigSource = sourceOf(environment);
    await source.load();

    environment.BINDER_CONFIG = '{"pg:database":';

    await expect(source.refresh()).to.be.rejectedWith(ConfigurationError);
    expect(source.asString('pg:database')).to.equal('app');
  });
});
