// SPDX-License-Identifier: Apache-2.0

import {SettingsError} from './settings-error.js';

export class UnsupportedOperationError extends SettingsError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
