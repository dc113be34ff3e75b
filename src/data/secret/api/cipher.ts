// SPDX-License-Identifier: Apache-2.0

/**
 * A reversible transformation of property values, registered under an algorithm name.
 */
export interface Cipher {
  readonly algorithm: string;

  encrypt(clearText: string): string;

  decrypt(encryptedText: string): string;
}
