// SPDX-License-Identifier: Apache-2.0

import {type Configuration} from './configuration.js';
import {type PropertyDeclaration} from '../../schema/api/property-declaration.js';
import {type SecretCodec} from '../../secret/api/secret-codec.js';

/**
 * Fluent builder for creating a Configuration instance.
 */
export interface ConfigurationBuilder {
  /**
   * Adds the specified property declarations to the schema of the configuration.
   *
   * @param declarations - The declarations to be added.
   */
  withDeclarations(...declarations: PropertyDeclaration[]): ConfigurationBuilder;

  /**
   * Adds the specified raw property values. Later values replace earlier ones with the same key.
   *
   * @param properties - The property values keyed by property key.
   */
  withProperties(properties: ReadonlyMap<string, string> | Readonly<Record<string, string>>): ConfigurationBuilder;

  /**
   * Sets the codec used to decrypt secret values. Values are read as they are when no codec is set.
   */
  withSecretCodec(codec: SecretCodec): ConfigurationBuilder;

  /**
   * Builds a {@link Configuration} instance.
   */
  build(): Configuration;
}
