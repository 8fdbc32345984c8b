// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {BinderError} from '../../../../src/core/errors/binder-error.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {MissingConfigError} from '../../../../src/data/configuration/api/missing-config-error.js';
import {TypeMismatchError} from '../../../../src/data/binder/api/type-mismatch-error.js';
import {UnsupportedFieldTypeError} from '../../../../src/data/binder/api/unsupported-field-type-error.js';
import {SecretOnNonDeferredFieldError} from '../../../../src/data/binder/api/secret-on-non-deferred-field-error.js';

describe('Errors', () => {
  it('should append the stack of the cause', () => {
    const cause: Error = new Error('root cause');
    const error: BinderError = new BinderError('wrapper', cause);

    expect(error.name).to.equal('BinderError');
    expect(error.cause).to.equal(cause);
    expect(error.stack).to.include('Caused by: Error: root cause');
  });

  it('should carry metadata', () => {
    expect(new IllegalArgumentError('bad value', 42).meta).to.deep.equal({value: 42});
    expect(new MissingConfigError('pg:database').meta).to.deep.equal({key: 'pg:database'});
    expect(new TypeMismatchError('users[1].username', 'string', 'number').meta).to.deep.equal({
      path: 'users[1].username',
      expected: 'string',
      actual: 'number',
    });
    expect(new UnsupportedFieldTypeError('created', 'Date').meta).to.deep.equal({field: 'created', kind: 'Date'});
    expect(new SecretOnNonDeferredFieldError('token', 'string').meta).to.deep.equal({field: 'token', kind: 'string'});
  });

  it('should be instances of the base error', () => {
    const error: TypeMismatchError = new TypeMismatchError('role', 'object', 'array');

    expect(error).to.be.instanceOf(BinderError);
    expect(error.name).to.equal('TypeMismatchError');
    expect(error.message).to.equal("Type mismatch [ path = 'role', expected = 'object', actual = 'array' ]");
  });
});
