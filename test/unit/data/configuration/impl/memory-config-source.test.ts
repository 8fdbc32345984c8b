// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {MemoryConfigSource} from '../../../../../src/data/configuration/impl/memory-config-source.js';
import {ConfigurationError} from '../../../../../src/data/configuration/api/configuration-error.js';

describe('MemoryConfigSource', () => {
  it('should store values in their raw form', async () => {
    const source: MemoryConfigSource = new MemoryConfigSource(
      new Map<string, unknown>([
        ['pg:database', 'app'],
        [' pg:port ', 5432],
        ['pg:enabled', true],
        ['pg:users', [{username: 'a'}]],
        ['pg:unset', null],
      ]),
    );

    await source.load();

    expect(source.name).to.equal('MemoryConfigSource');
    expect(source.ordinal).to.equal(100);
    expect(Object.fromEntries(source.properties())).to.deep.equal({
      'pg:database': 'app',
      'pg:port': '5432',
      'pg:enabled': 'true',
      'pg:users': '[{"username":"a"}]',
    });
  });

  it('should reject values that have no raw form', async () => {
    const source: MemoryConfigSource = new MemoryConfigSource({'pg:callback': (): void => {}});

    await expect(source.load()).to.be.rejectedWith(ConfigurationError);
  });
});
