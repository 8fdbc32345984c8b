// SPDX-License-Identifier: Apache-2.0

import {ConfigKey, DataKey, Required, SecretKey} from '../../../src/data/binder/decorators/field-tags.js';
import {
  BoolField,
  DeferredField,
  FloatField,
  IntField,
  MapField,
  ReferenceField,
  SliceField,
  StringField,
  StructField,
} from '../../../src/data/binder/decorators/field-kinds.js';
import {DeferredKind} from '../../../src/data/deferred/deferred-kind.js';
import {type DeferredInt, type DeferredString} from '../../../src/data/deferred/deferred-value.js';

export class PgUserFixture {
  @ConfigKey('username')
  @StringField()
  public username: string = '';

  @ConfigKey('login')
  @BoolField()
  public login: boolean = false;

  @ConfigKey('connectionLimit')
  @IntField()
  public connectionLimit: number = 0;
}

export class PgRoleFixture {
  @ConfigKey('permission')
  @StringField()
  public permission: string = '';

  @ConfigKey('members')
  @ReferenceField(() => PgUserFixture)
  public members?: PgUserFixture[];
}

export class PgProviderFixture {
  @ConfigKey('host')
  @DeferredField(DeferredKind.String)
  public host?: DeferredString;

  @ConfigKey('port')
  @IntField()
  public port: number = 0;

  @ConfigKey('disableSSL')
  @BoolField()
  public disableSSL: boolean = false;

  @DataKey('timeout')
  @DeferredField(DeferredKind.Int)
  public timeout?: DeferredInt;
}

export class PgConfigFixture {
  @ConfigKey('database')
  @Required()
  @StringField()
  public database: string = '';

  @ConfigKey('provider')
  @StructField(() => PgProviderFixture)
  public provider: PgProviderFixture = new PgProviderFixture();

  @ConfigKey('users')
  @SliceField(() => PgUserFixture)
  public users: PgUserFixture[] = [];

  @ConfigKey('role')
  @ReferenceField(() => PgRoleFixture)
  public role?: PgRoleFixture;

  @ConfigKey('labels')
  @MapField()
  public labels?: Map<string, unknown>;

  @ConfigKey('exportAsSecret')
  @BoolField()
  public exportAsSecret: boolean = false;

  @DataKey('maxConnections')
  @IntField()
  public maxConnections: number = 0;

  @ConfigKey('cpuShare')
  @FloatField()
  public cpuShare: number = 0;

  @SecretKey('password')
  @DeferredField(DeferredKind.String)
  public password?: DeferredString;

  @ConfigKey('owner')
  @DeferredField(DeferredKind.String)
  public owner?: DeferredString;

  // not tagged, never bound
  public notes: string = 'untouched';
}

export class SecretScalarFixture {
  @SecretKey('token')
  @StringField()
  public token: string = '';
}

export class SecretStructFixture {
  @SecretKey('provider')
  @StructField(() => PgProviderFixture)
  public provider: PgProviderFixture = new PgProviderFixture();
}

export class UnknownKindFixture {
  @ConfigKey('created')
  public created?: Date;
}

export class RequiredRoleFixture {
  @ConfigKey('role')
  @Required()
  @StructField(() => PgRoleFixture)
  public role: PgRoleFixture = new PgRoleFixture();
}

export class PgNodeFixture {
  @ConfigKey('name')
  @StringField()
  public name: string = '';

  public parent?: PgNodeHolderFixture;
}

export class PgNodeHolderFixture {
  @ConfigKey('node')
  @Required()
  @ReferenceField(() => PgNodeFixture)
  public node?: PgNodeFixture;
}
