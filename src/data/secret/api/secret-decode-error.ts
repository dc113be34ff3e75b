// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from '../../configuration/api/configuration-error.js';

export class SecretDecodeError extends ConfigurationError {
  /**
   * @param key - the property whose value could not be decrypted
   * @param cause - the error raised by the secret codec
   */
  public constructor(
    public readonly key: string,
    cause?: unknown,
  ) {
    super(`Failed to decrypt the property '${key}'. Please check your secret key.`, cause, {key});
  }
}
