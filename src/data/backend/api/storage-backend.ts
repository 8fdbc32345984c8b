// SPDX-License-Identifier: Apache-2.0

/**
 * The storage backend implementations provide the logic to read configuration data from various storage mediums.
 *
 * Storage backends should not attempt to interpret or validate the data being read. Interpreting the bytes is left to
 * the configuration source that owns the backend.
 */
export interface StorageBackend {
  /**
   * List all keys in the storage backend.
   *
   * @returns A list of keys in the storage backend.
   */
  list(): Promise<string[]>;

  /**
   * Reads the persisted data from the storage backend.
   *
   * @param key - The key to use to read the data from the storage backend. The key is implementation specific and might
   *              be a file name or an environment variable name.
   * @returns The persisted data represented as a byte array.
   */
  readBytes(key: string): Promise<Uint8Array>;
}
