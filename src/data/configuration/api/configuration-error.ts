// SPDX-License-Identifier: Apache-2.0

import {SettingsError} from '../../../core/errors/settings-error.js';

/**
 * General purpose error for configuration failures.
 */
export class ConfigurationError extends SettingsError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
