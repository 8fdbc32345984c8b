// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {ZeroValue} from '../../../../src/business/utils/zero-value.js';
import {Deferred} from '../../../../src/data/deferred/deferred.js';
import {DeferredKind} from '../../../../src/data/deferred/deferred-kind.js';
import {PgConfigFixture, PgNodeFixture, PgNodeHolderFixture, PgProviderFixture} from '../../fixtures/pg-config.fixture.js';

describe('ZeroValue', () => {
  it('should treat empty primitives as zero', () => {
    for (const value of [undefined, null, '', 0, false]) {
      expect(ZeroValue.isZero(value), String(value)).to.be.true;
    }
    for (const value of ['a', 1, -1, true, Number.NaN]) {
      expect(ZeroValue.isZero(value), String(value)).to.be.false;
    }
  });

  it('should treat empty collections as zero', () => {
    expect(ZeroValue.isZero([])).to.be.true;
    expect(ZeroValue.isZero(new Map<string, number>())).to.be.true;
    expect(ZeroValue.isZero([0])).to.be.false;
    expect(ZeroValue.isZero(new Map([['a', 0]]))).to.be.false;
  });

  it('should look through literal deferred values only', () => {
    expect(ZeroValue.isZero(Deferred.string(''))).to.be.true;
    expect(ZeroValue.isZero(Deferred.int(0))).to.be.true;
    expect(ZeroValue.isZero(Deferred.string('app'))).to.be.false;
    expect(ZeroValue.isZero(Deferred.pending(DeferredKind.String, {id: 'handle-1'}, false))).to.be.false;
  });

  it('should treat objects with only zero fields as zero', () => {
    const provider: PgProviderFixture = new PgProviderFixture();
    expect(ZeroValue.isZero(provider)).to.be.true;

    provider.port = 5432;
    expect(ZeroValue.isZero(provider)).to.be.false;
    expect(ZeroValue.isZero(new PgConfigFixture())).to.be.false;
  });

  it('should stop at objects it has already visited', () => {
    const holder: PgNodeHolderFixture = new PgNodeHolderFixture();
    const node: PgNodeFixture = new PgNodeFixture();
    node.parent = holder;
    holder.node = node;

    expect(ZeroValue.isZero(holder)).to.be.true;

    node.name = 'primary';
    expect(ZeroValue.isZero(holder)).to.be.false;
  });
});
