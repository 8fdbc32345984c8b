// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import {expect} from 'chai';
import {FieldDescriptorResolver} from '../../../../../src/data/binder/impl/field-descriptor-resolver.js';
import {type FieldDescriptor} from '../../../../../src/data/binder/api/field-descriptor.js';
import {FieldKind} from '../../../../../src/data/binder/api/field-kind.js';
import {ConfigKey, DataKey, Required, SecretKey} from '../../../../../src/data/binder/decorators/field-tags.js';
import {IntField, StringField} from '../../../../../src/data/binder/decorators/field-kinds.js';
import {DeferredKind} from '../../../../../src/data/deferred/deferred-kind.js';
import {
  PgConfigFixture,
  PgNodeFixture,
  PgNodeHolderFixture,
  PgUserFixture,
} from '../../../fixtures/pg-config.fixture.js';

class TagPriorityFixture {
  @ConfigKey('fromConfig')
  @DataKey('fromData')
  @SecretKey('fromSecret')
  @StringField()
  public value: string = '';
}

class ConfigOnlyFixture {
  @ConfigKey('db_name')
  @StringField()
  public databaseName: string = '';
}

class DataOverSecretFixture {
  @DataKey('fromData')
  @SecretKey('fromSecret')
  @StringField()
  public value: string = '';
}

class BaseFixture {
  @ConfigKey('name')
  @StringField()
  public name: string = '';
}

class DerivedFixture extends BaseFixture {
  @ConfigKey('size')
  @Required()
  @IntField()
  public size: number = 0;
}

class InferredFixture {
  @ConfigKey('label')
  public label: string = '';

  @ConfigKey('ratio')
  public ratio: number = 0;
}

function byProperty(descriptors: readonly FieldDescriptor[], propertyKey: string): FieldDescriptor {
  const descriptor: FieldDescriptor | undefined = descriptors.find(d => d.propertyKey === propertyKey);
  if (!descriptor) {
    throw new Error(`no descriptor for ${propertyKey}`);
  }
  return descriptor;
}

describe('FieldDescriptorResolver', () => {
  let resolver: FieldDescriptorResolver;

  beforeEach(() => {
    resolver = new FieldDescriptorResolver();
  });

  it('should describe tagged properties in declaration order', () => {
    const descriptors: readonly FieldDescriptor[] = resolver.describe(new PgConfigFixture());

    expect(descriptors.map(d => d.propertyKey)).to.deep.equal([
      'database',
      'provider',
      'users',
      'role',
      'labels',
      'exportAsSecret',
      'maxConnections',
      'cpuShare',
      'password',
      'owner',
    ]);
  });

  it('should describe a secret deferred field', () => {
    const password: FieldDescriptor = byProperty(resolver.describe(new PgConfigFixture()), 'password');

    expect(password.sourceFieldName).to.equal('password');
    expect(password.isSecret).to.be.true;
    expect(password.jsonFieldName).to.be.undefined;
    expect(password.kind).to.equal(FieldKind.Deferred);
    expect(password.deferredKind).to.equal(DeferredKind.String);
  });

  it('should describe a slice with its element type', () => {
    const users: FieldDescriptor = byProperty(resolver.describe(new PgConfigFixture()), 'users');

    expect(users.kind).to.equal(FieldKind.Slice);
    expect(users.elementType?.()).to.equal(PgUserFixture);
  });

  it('should take the config tag before the data and secret tags', () => {
    const value: FieldDescriptor = byProperty(resolver.describe(new TagPriorityFixture()), 'value');

    expect(value.sourceFieldName).to.equal('fromConfig');
    expect(value.jsonFieldName).to.equal('fromConfig');
    expect(value.displayName).to.equal('fromData');
    expect(value.isSecret).to.be.false;
  });

  it('should display a field without a data tag under its property name', () => {
    const value: FieldDescriptor = byProperty(resolver.describe(new ConfigOnlyFixture()), 'databaseName');

    expect(value.sourceFieldName).to.equal('db_name');
    expect(value.displayName).to.equal('databaseName');
  });

  it('should take the data tag before the secret tag', () => {
    const value: FieldDescriptor = byProperty(resolver.describe(new DataOverSecretFixture()), 'value');

    expect(value.sourceFieldName).to.equal('fromData');
    expect(value.isSecret).to.be.false;
  });

  it('should include inherited fields first', () => {
    const descriptors: readonly FieldDescriptor[] = resolver.describe(new DerivedFixture());

    expect(descriptors.map(d => d.sourceFieldName)).to.deep.equal(['name', 'size']);
    expect(byProperty(descriptors, 'size').required).to.be.true;
    expect(byProperty(descriptors, 'name').required).to.be.false;
  });

  it('should compute descriptors once per class', () => {
    expect(resolver.describe(new PgConfigFixture())).to.equal(resolver.describe(new PgConfigFixture()));
  });

  it('should describe nothing for plain objects', () => {
    expect(resolver.describe({database: 'app'})).to.be.empty;
  });

  it('should infer the kind from recorded design types', () => {
    Reflect.defineMetadata('design:type', String, InferredFixture.prototype, 'label');
    Reflect.defineMetadata('design:type', Number, InferredFixture.prototype, 'ratio');

    const descriptors: readonly FieldDescriptor[] = resolver.describe(new InferredFixture());

    expect(byProperty(descriptors, 'label').kind).to.equal(FieldKind.String);
    expect(byProperty(descriptors, 'ratio').kind).to.equal(FieldKind.Float);
  });

  it('should only require values for empty fields', () => {
    const database: FieldDescriptor = byProperty(resolver.describe(new PgConfigFixture()), 'database');

    expect(resolver.isRequired(database, '')).to.be.true;
    expect(resolver.isRequired(database, 'app')).to.be.false;
  });

  it('should only require references that point at nothing', () => {
    const node: FieldDescriptor = byProperty(resolver.describe(new PgNodeHolderFixture()), 'node');
    const role: FieldDescriptor = byProperty(resolver.describe(new PgConfigFixture()), 'role');

    expect(resolver.isRequired(node, undefined)).to.be.true;
    expect(resolver.isRequired(node, null)).to.be.true;
    expect(resolver.isRequired(node, new PgNodeFixture())).to.be.false;
    expect(resolver.isRequired(role, undefined)).to.be.false;
  });
});
