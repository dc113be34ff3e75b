// SPDX-License-Identifier: Apache-2.0

import {type SecretCodec} from '../api/secret-codec.js';
import {type Cipher} from '../api/cipher.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

const ENCRYPTED_PATTERN: RegExp = /^\{([^{}]+)\}(.*)$/s;

/**
 * A {@link SecretCodec} for values of the form `{algorithm}payload`, where the payload is decrypted by the
 * {@link Cipher} registered for the algorithm.
 *
 * <p>
 * Values whose prefix does not name a registered algorithm are not considered encrypted and are read as they are.
 */
export class PrefixedSecretCodec implements SecretCodec {
  private readonly ciphers: Map<string, Cipher> = new Map<string, Cipher>();

  public constructor(...ciphers: Cipher[]) {
    for (const cipher of ciphers) {
      this.ciphers.set(cipher.algorithm, cipher);
    }
  }

  public isEncrypted(value: string): boolean {
    const match: RegExpMatchArray | null = value.match(ENCRYPTED_PATTERN);
    return match !== null && this.ciphers.has(match[1]);
  }

  public decrypt(value: string): string {
    const match: RegExpMatchArray | null = value.match(ENCRYPTED_PATTERN);
    const cipher: Cipher | undefined = match ? this.ciphers.get(match[1]) : undefined;
    if (!match || !cipher) {
      return value;
    }

    return cipher.decrypt(match[2]);
  }

  public encrypt(algorithm: string, clearText: string): string {
    const cipher: Cipher | undefined = this.ciphers.get(algorithm);
    if (!cipher) {
      throw new IllegalArgumentError(`no cipher registered for algorithm '${algorithm}'`, algorithm);
    }

    return `{${algorithm}}${cipher.encrypt(clearText)}`;
  }
}
