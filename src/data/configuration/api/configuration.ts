// SPDX-License-Identifier: Apache-2.0

/**
 * Read access to resolved configuration properties.
 *
 * <p>
 * A value set in the property store wins over the declared default of the property. Reading a property declared as
 * multi-valued with a scalar accessor, or a single-valued one with {@link Configuration#getStringArray}, is tolerated
 * and reported as a warning.
 */
export interface Configuration {
  /**
   * Retrieves the value of a property, decrypted when it is a secret. Multi-valued properties are returned unsplit.
   *
   * @param key - The key of the property.
   * @returns The stored value, else the declared default, else null.
   */
  get(key: string): string | null;

  /**
   * Retrieves the values of a multi-valued property.
   *
   * @param key - The key of the property.
   * @returns The fields of the stored value, else of the declared default, else an empty array.
   * @throws MalformedMultiValueError if the value is not a valid comma separated list.
   */
  getStringArray(key: string): string[];

  /**
   * Determines whether the property store holds a value for the key. Declared defaults are not considered.
   */
  hasKey(key: string): boolean;

  getBoolean(key: string): boolean | null;

  /**
   * @throws ConfigurationError if the value is not an integer within the signed 32-bit range.
   */
  getInt(key: string): number | null;

  /**
   * @throws ConfigurationError if the value is not a finite decimal number.
   */
  getFloat(key: string): number | null;
}
