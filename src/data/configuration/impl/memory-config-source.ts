// SPDX-License-Identifier: Apache-2.0

import {LayeredConfigSource} from './layered-config-source.js';
import {MEMORY_SOURCE_ORDINAL} from '../../../core/constants.js';

/**
 * A configuration source backed by entries supplied in code. Structured values may be given as objects or arrays.
 */
export class MemoryConfigSource extends LayeredConfigSource {
  private readonly entries: Map<string, unknown>;

  public constructor(
    entries: Map<string, unknown> | Record<string, unknown> = {},
    private readonly sourceName: string = 'MemoryConfigSource',
    private readonly sourceOrdinal: number = MEMORY_SOURCE_ORDINAL,
  ) {
    super();
    this.entries = entries instanceof Map ? new Map<string, unknown>(entries) : new Map(Object.entries(entries));
  }

  public get name(): string {
    return this.sourceName;
  }

  public get ordinal(): number {
    return this.sourceOrdinal;
  }

  /**
   * Replaces an entry. The change is visible after the next {@link load} or {@link refresh}.
   */
  public set(key: string, value: unknown): void {
    this.entries.set(key, value);
  }

  public async load(): Promise<void> {
    this.replace(this.entries);
  }
}
