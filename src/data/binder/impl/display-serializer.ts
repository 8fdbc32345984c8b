// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type FieldDescriptor} from '../api/field-descriptor.js';
import {type FieldDescriptorResolver} from './field-descriptor-resolver.js';
import {Deferred} from '../../deferred/deferred.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * Renders an object graph as JSON for humans. Deferred values never appear in clear text, whether or not they were
 * resolved, so the output is safe to log.
 */
@injectable()
export class DisplaySerializer {
  private readonly resolver: FieldDescriptorResolver;

  public constructor(@inject(InjectTokens.FieldDescriptorResolver) resolver?: FieldDescriptorResolver) {
    this.resolver = patchInject(resolver, InjectTokens.FieldDescriptorResolver, this.constructor.name);
  }

  public serializeForDisplay(target: object): string {
    if (typeof target !== 'object' || target === null || Array.isArray(target)) {
      throw new IllegalArgumentError('display target must be an object', target);
    }

    return JSON.stringify(this.redact(target));
  }

  /**
   * Same as {@link serializeForDisplay}.
   */
  public marshalJsonConfig(target: object): string {
    return this.serializeForDisplay(target);
  }

  private redact(value: unknown): unknown {
    if (typeof value !== 'object' || value === null) {
      return value;
    }

    if (Deferred.isDeferred(value)) {
      return Deferred.placeholder(value.kind);
    }

    if (Array.isArray(value)) {
      return value.map((item: unknown): unknown => this.redact(item));
    }

    if (value instanceof Map) {
      const entries: Record<string, unknown> = {};
      for (const [key, item] of value) {
        entries[String(key)] = this.redact(item);
      }
      return entries;
    }

    const displayNames: Map<string, string> = new Map<string, string>(
      this.resolver.describe(value).map((descriptor: FieldDescriptor): [string, string] => [
        descriptor.propertyKey,
        descriptor.displayName,
      ]),
    );

    const output: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      output[displayNames.get(key) ?? key] = this.redact(item);
    }
    return output;
  }
}
