// SPDX-License-Identifier: Apache-2.0

/**
 * Detects and reverses the transformation applied to secret configuration values. Implementations must be
 * synchronous and must not depend on the state of the configuration reading them.
 */
export interface SecretCodec {
  /**
   * Determines whether the value is in encrypted form.
   *
   * @param value - the raw property value.
   */
  isEncrypted(value: string): boolean;

  /**
   * Decrypts a value for which {@link SecretCodec#isEncrypted} returned true.
   *
   * @param value - the encrypted property value.
   * @returns the clear text.
   * @throws Error if the value cannot be decrypted.
   */
  decrypt(value: string): string;
}
