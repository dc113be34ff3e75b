// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogFile: Symbol.for('LogFile'),
  SettingsLogger: Symbol.for('SettingsLogger'),
  ConfigurationProvider: Symbol.for('ConfigurationProvider'),
} as const;
