// SPDX-License-Identifier: Apache-2.0

import {type ConfigurationBuilder} from '../api/configuration-builder.js';
import {type Configuration} from '../api/configuration.js';
import {type PropertyDeclaration} from '../../schema/api/property-declaration.js';
import {type SecretCodec} from '../../secret/api/secret-codec.js';
import {PrefixedSecretCodec} from '../../secret/impl/prefixed-secret-codec.js';
import {DeclaredPropertySchema} from '../../schema/impl/declared-property-schema.js';
import {type SettingsLogger} from '../../../core/logging/settings-logger.js';
import {DefaultConfiguration} from './default-configuration.js';

function isPropertyMap(
  properties: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
): properties is ReadonlyMap<string, string> {
  return typeof properties.entries === 'function';
}

export class DefaultConfigurationBuilder implements ConfigurationBuilder {
  private readonly declarations: PropertyDeclaration[];
  private readonly properties: Map<string, string>;
  private codec: SecretCodec;

  public constructor(private readonly logger: SettingsLogger) {
    this.declarations = [];
    this.properties = new Map<string, string>();
    this.codec = new PrefixedSecretCodec();
  }

  public withDeclarations(...declarations: PropertyDeclaration[]): ConfigurationBuilder {
    this.declarations.push(...declarations);
    return this;
  }

  public withProperties(
    properties: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
  ): ConfigurationBuilder {
    const entries: Iterable<[string, string]> = isPropertyMap(properties)
      ? properties.entries()
      : Object.entries(properties);
    for (const [key, value] of entries) {
      this.properties.set(key, value);
    }
    return this;
  }

  public withSecretCodec(codec: SecretCodec): ConfigurationBuilder {
    this.codec = codec;
    return this;
  }

  public build(): Configuration {
    return new DefaultConfiguration(
      new DeclaredPropertySchema(this.declarations),
      new Map<string, string>(this.properties),
      this.codec,
      this.logger,
    );
  }
}
