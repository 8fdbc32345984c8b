// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {Prefix} from '../../../../src/data/key/prefix.js';
import {ConfigKeyFormatter} from '../../../../src/data/key/config-key-formatter.js';

describe('Prefix', () => {
  it('should add the namespace once', () => {
    expect(Prefix.add('database', 'pg')).to.equal('pg:database');
    expect(Prefix.add(' database ', 'pg:')).to.equal('pg:database');
    expect(Prefix.add('pg:database', 'pg')).to.equal('pg:database');
    expect(Prefix.add('database')).to.equal('database');
  });

  it('should strip the namespace', () => {
    expect(Prefix.strip('pg:provider', 'pg')).to.equal('provider');
    expect(Prefix.strip('other:provider', 'pg')).to.equal('other:provider');
  });

  it('should match keys of the namespace only', () => {
    expect(Prefix.matcher('pg:database', 'pg')).to.be.true;
    expect(Prefix.matcher('pgsql:database', 'pg')).to.be.false;
    expect(Prefix.matcher('anything')).to.be.true;
    expect(Prefix.matcher('', 'pg')).to.be.false;
  });
});

describe('ConfigKeyFormatter', () => {
  it('should keep the case of keys', () => {
    expect(ConfigKeyFormatter.instance().normalize(' pg:exportAsSecret ')).to.equal('pg:exportAsSecret');
  });
});
