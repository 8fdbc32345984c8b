// SPDX-License-Identifier: Apache-2.0

/**
 * Implementations of config accessor provide the necessary methods to access configuration properties.
 */
export interface ConfigAccessor {
  /**
   * Enumerates the set of property names that are available in the configuration source.
   *
   * @returns A set of property names that are available in the configuration source.
   */
  propertyNames(): Set<string>;

  /**
   * Enumerates the key-value pairs that are available in the configuration source.
   *
   * @returns A map of key-value pairs that are available in the configuration source.
   */
  properties(): Map<string, string>;

  /**
   * Retrieves the raw value of the specified key from the configuration source. Structured values are returned as
   * JSON text.
   *
   * @param key - The fully qualified key to use to retrieve the value from the configuration source.
   * @returns The value of the specified key, or null when the key is absent.
   */
  asString(key: string): string | null;
}
