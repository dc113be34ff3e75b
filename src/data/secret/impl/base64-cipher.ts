// SPDX-License-Identifier: Apache-2.0

import * as Base64 from 'js-base64';
import {type Cipher} from '../api/cipher.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * Obfuscates values using base64. It only keeps secrets away from casual reading and offers no protection.
 */
export class Base64Cipher implements Cipher {
  public readonly algorithm: string = 'b64';

  public encrypt(clearText: string): string {
    return Base64.encode(clearText);
  }

  public decrypt(encryptedText: string): string {
    if (!Base64.isValid(encryptedText)) {
      throw new IllegalArgumentError('value is not base64 encoded', encryptedText);
    }

    return Base64.decode(encryptedText);
  }
}
