// SPDX-License-Identifier: Apache-2.0

import {
  type ConfigurationSource,
  EMPTY_BLOB,
  type JsonBlob,
} from '../../binder/api/configuration-source.js';
import {type Config} from '../api/config.js';
import {type DeferredEngine} from '../../deferred/deferred-engine.js';
import {DeferredKind, type DeferredValueTypes} from '../../deferred/deferred-kind.js';
import {
  type DeferredBool,
  type DeferredFloat,
  type DeferredInt,
  type DeferredString,
  type DeferredValue,
} from '../../deferred/deferred-value.js';
import {Deferred} from '../../deferred/deferred.js';
import {type KeyFormatter} from '../../key/key-formatter.js';
import {ConfigKeyFormatter} from '../../key/config-key-formatter.js';
import {Prefix} from '../../key/prefix.js';
import {MissingConfigError} from '../api/missing-config-error.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {Regex} from '../../../business/utils/regex.js';
import {ZeroValue} from '../../../business/utils/zero-value.js';

/**
 * A {@link ConfigurationSource} that reads `namespace:key` entries from a {@link Config}. Secret deferred values are
 * registered with the {@link DeferredEngine} and only their handles are returned.
 */
export class NamespacedConfigurationSource implements ConfigurationSource {
  public constructor(
    private readonly config: Config,
    public readonly namespace: string,
    private readonly engine: DeferredEngine,
    private readonly formatter: KeyFormatter = ConfigKeyFormatter.instance(),
  ) {
    if (!namespace || namespace.trim().length === 0) {
      throw new IllegalArgumentError('namespace must not be null, undefined or empty', namespace);
    }
  }

  public keys(): Set<string> {
    const keys: Set<string> = new Set<string>();
    for (const key of this.config.propertyNames()) {
      if (Prefix.matcher(key, this.namespace, this.formatter)) {
        keys.add(Prefix.strip(key, this.namespace, this.formatter));
      }
    }

    return keys;
  }

  public getString(key: string, required: boolean): string {
    return this.read(key, required) ?? '';
  }

  public getBool(key: string, required: boolean): boolean {
    const raw: string | null = this.read(key, required);
    if (raw === null) {
      return false;
    }

    switch (raw.trim().toLowerCase()) {
      case 'true': {
        return true;
      }
      case 'false': {
        return false;
      }
      default: {
        throw new ConfigurationError(`Configuration value is not a boolean [ key = '${this.qualify(key)}' ]`);
      }
    }
  }

  public getInt(key: string, required: boolean): number {
    const raw: string | null = this.read(key, required);
    if (raw === null) {
      return 0;
    }

    const value: number = Regex.DECIMAL_INTEGER.test(raw.trim()) ? Number(raw) : Number.NaN;
    if (!Number.isSafeInteger(value)) {
      throw new ConfigurationError(`Configuration value is not an integer [ key = '${this.qualify(key)}' ]`);
    }

    return value;
  }

  public getFloat(key: string, required: boolean): number {
    return this.parseNumber(key, this.read(key, required));
  }

  public getDeferredString(key: string, required: boolean, secret: boolean): DeferredString {
    return this.wrap(DeferredKind.String, this.getString(key, required), secret);
  }

  public getDeferredBool(key: string, required: boolean, secret: boolean): DeferredBool {
    return this.wrap(DeferredKind.Bool, this.getBool(key, required), secret);
  }

  public getDeferredInt(key: string, required: boolean, secret: boolean): DeferredInt {
    return this.wrap(DeferredKind.Int, this.getInt(key, required), secret);
  }

  public getDeferredFloat(key: string, required: boolean, secret: boolean): DeferredFloat {
    return this.wrap(DeferredKind.Float, this.getFloat(key, required), secret);
  }

  public getJSONBlob(key: string, required: boolean, existingValue: unknown): JsonBlob {
    const raw: string | null = this.config.asString(this.qualify(key));
    if (raw !== null && raw.trim().length > 0) {
      return raw;
    }

    if (required && ZeroValue.isZero(existingValue)) {
      throw new MissingConfigError(this.qualify(key));
    }

    return EMPTY_BLOB;
  }

  private qualify(key: string): string {
    return Prefix.add(key, this.namespace, this.formatter);
  }

  private read(key: string, required: boolean): string | null {
    const qualifiedKey: string = this.qualify(key);
    const raw: string | null = this.config.asString(qualifiedKey);
    if (raw === null && required) {
      throw new MissingConfigError(qualifiedKey);
    }

    return raw;
  }

  private parseNumber(key: string, raw: string | null): number {
    if (raw === null) {
      return 0;
    }

    const value: number = raw.trim().length > 0 ? Number(raw) : Number.NaN;
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`Configuration value is not a number [ key = '${this.qualify(key)}' ]`);
    }

    return value;
  }

  private wrap<K extends DeferredKind>(kind: K, value: DeferredValueTypes[K], secret: boolean): DeferredValue<K> {
    return secret ? this.engine.register(kind, value, {secret: true}) : Deferred.literal(kind, value);
  }
}
