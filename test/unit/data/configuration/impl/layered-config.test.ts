// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {type ConfigSource} from '../../../../../src/data/configuration/spi/config-source.js';
import {SimpleConfigSourceFixture} from '../../../fixtures/simple-config-source.fixture.js';
import {LayeredConfig} from '../../../../../src/data/configuration/impl/layered-config.js';
import {MemoryConfigSource} from '../../../../../src/data/configuration/impl/memory-config-source.js';

describe('LayeredConfig', () => {
  let map1: Map<string, string>;
  let map2: Map<string, string>;
  let map3: Map<string, string>;
  let simpleConfigSourceOrdinal1: ConfigSource;
  let simpleConfigSourceOrdinal2: ConfigSource;
  let simpleConfigSourceOrdinal3: SimpleConfigSourceFixture;
  let layeredConfig: LayeredConfig;

  beforeEach(() => {
    map1 = new Map<string, string>();
    map2 = new Map<string, string>();
    map3 = new Map<string, string>();
    map1.set('pg:key1', 'map1key1value1');
    map1.set('pg:key2', 'map1key2value2');
    map2.set('pg:key2', 'map2key2value2');
    map2.set('pg:key3', 'map2key3value3');
    map3.set('pg:key3', 'map3key3value3');

    simpleConfigSourceOrdinal1 = new SimpleConfigSourceFixture('simpleConfigSource1', 1, map1);
    simpleConfigSourceOrdinal2 = new SimpleConfigSourceFixture('simpleConfigSource2', 2, map2);
    simpleConfigSourceOrdinal3 = new SimpleConfigSourceFixture('simpleConfigSource3', 3, map3);

    layeredConfig = new LayeredConfig([
      simpleConfigSourceOrdinal2,
      simpleConfigSourceOrdinal3,
      simpleConfigSourceOrdinal1,
    ]);
  });

  it('should sort sources by ordinal', () => {
    expect(layeredConfig.sources.map(source => source.ordinal)).to.deep.equal([1, 2, 3]);

    const propertyMap: Map<string, string> = layeredConfig.properties();
    expect(propertyMap.get('pg:key1')).to.equal('map1key1value1');
    expect(propertyMap.get('pg:key2')).to.equal('map2key2value2');
    expect(propertyMap.get('pg:key3')).to.equal('map3key3value3');
  });

  it('should return the value of the highest ordinal source', () => {
    expect(layeredConfig.asString('pg:key2')).to.equal('map2key2value2');
    expect(layeredConfig.asString('pg:key3')).to.equal('map3key3value3');
    expect(layeredConfig.asString('pg:missing')).to.be.null;
  });

  it('should return the correct property names', () => {
    expect([...layeredConfig.propertyNames()].sort()).to.deep.equal(['pg:key1', 'pg:key2', 'pg:key3']);
  });

  it('should return the correct properties after a refresh', async () => {
    const refreshed: Map<string, string> = new Map<string, string>();
    refreshed.set('pg:key1', 'map3key1value1');
    refreshed.set('pg:key4', 'map3key4value4');
    simpleConfigSourceOrdinal3.props2 = refreshed;

    await layeredConfig.refresh();

    expect(layeredConfig.asString('pg:key1')).to.equal('map3key1value1');
    expect(layeredConfig.asString('pg:key3')).to.be.null;
    expect(layeredConfig.asString('pg:key4')).to.equal('map3key4value4');
  });

  it('should load memory sources on refresh', async () => {
    const memory: MemoryConfigSource = new MemoryConfigSource({'pg:database': 'app'}, 'defaults', 0);
    const config: LayeredConfig = new LayeredConfig([memory]);

    expect(config.asString('pg:database')).to.be.null;
    await config.refresh();
    expect(config.asString('pg:database')).to.equal('app');

    memory.set('pg:database', 'changed');
    await config.refresh();
    expect(config.asString('pg:database')).to.equal('changed');
  });
});
