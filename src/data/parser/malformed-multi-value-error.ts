// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from '../configuration/api/configuration-error.js';

/**
 * Raised when a multi-valued property holds a string that is not a valid comma separated list.
 */
export class MalformedMultiValueError extends ConfigurationError {
  public constructor(
    public readonly key: string,
    public readonly value: string,
  ) {
    super(`Property: '${key}' doesn't contain a valid CSV value: '${value}'`, undefined, {key, value});
  }
}
