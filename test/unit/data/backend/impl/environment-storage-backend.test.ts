// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {EnvironmentStorageBackend} from '../../../../../src/data/backend/impl/environment-storage-backend.js';
import {StorageBackendError} from '../../../../../src/data/backend/api/storage-backend-error.js';

describe('Environment Storage Backend', () => {
  const environment: NodeJS.ProcessEnv = {BINDER_CONFIG: '{"pg:database":"app"}', HOME: '/home/test'};

  it('test list', async () => {
    const backend: EnvironmentStorageBackend = new EnvironmentStorageBackend(environment);

    expect(await backend.list()).to.deep.equal(['BINDER_CONFIG', 'HOME']);
  });

  it('test readBytes', async () => {
    const backend: EnvironmentStorageBackend = new EnvironmentStorageBackend(environment);

    const bytes: Uint8Array = await backend.readBytes('BINDER_CONFIG');

    expect(Buffer.from(bytes).toString('utf8')).to.equal('{"pg:database":"app"}');
  });

  it('test readBytes of a missing variable', async () => {
    const backend: EnvironmentStorageBackend = new EnvironmentStorageBackend(environment);

    await expect(backend.readBytes('MISSING')).to.be.rejectedWith(StorageBackendError, 'key not found: MISSING');
  });
});
