// SPDX-License-Identifier: Apache-2.0

export type LogMeta = Record<string, unknown>;

export interface SettingsLogger {
  nextTraceId(): void;

  prepMeta(meta?: LogMeta): LogMeta;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;
}
