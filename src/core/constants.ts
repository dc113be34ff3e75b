// SPDX-License-Identifier: Apache-2.0

export const DEFAULT_LOG_LEVEL = process.env.SETTINGS_LOG_LEVEL || 'info';
export const DEFAULT_LOG_FILE = process.env.SETTINGS_LOG_FILE || '';
