// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../api/config.js';
import {type ConfigSource} from '../spi/config-source.js';
import {ReflectAssist} from '../../../business/utils/reflect-assist.js';
import {Comparators} from '../../../business/utils/comparators.js';

/**
 * Combines configuration sources by ordinal. For every key the source with the highest ordinal wins.
 */
export class LayeredConfig implements Config {
  public readonly sources: ConfigSource[];

  public constructor(sources: ConfigSource[] = []) {
    this.sources = [...sources].sort(Comparators.configSource);
  }

  public asString(key: string): string | null {
    let value: string | null = null;

    for (const source of this.sources) {
      const currentValue: string | null = source.asString(key);
      if (currentValue !== null) {
        value = currentValue;
      }
    }

    return value;
  }

  public properties(): Map<string, string> {
    const finalMap: Map<string, string> = new Map<string, string>();

    for (const source of this.sources) {
      for (const [key, value] of source.properties()) {
        finalMap.set(key, value);
      }
    }

    return finalMap;
  }

  public propertyNames(): Set<string> {
    const finalSet: Set<string> = new Set<string>();

    for (const source of this.sources) {
      for (const key of source.propertyNames()) {
        finalSet.add(key);
      }
    }

    return finalSet;
  }

  public async refresh(): Promise<void> {
    for (const source of this.sources) {
      await (ReflectAssist.isRefreshable(source) ? source.refresh() : source.load());
    }
  }
}
