// SPDX-License-Identifier: Apache-2.0

import {type ConfigurationBuilder} from './configuration-builder.js';

/**
 * The ConfigurationProvider interface hands out builders wired with the application wide dependencies.
 */
export interface ConfigurationProvider {
  /**
   * Creates a new configuration builder. Every configuration it builds is independent of the others.
   *
   * @returns A new configuration builder instance.
   */
  builder(): ConfigurationBuilder;
}
