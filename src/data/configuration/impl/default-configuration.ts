// SPDX-License-Identifier: Apache-2.0

import {type Configuration} from '../api/configuration.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {type PropertySchema} from '../../schema/api/property-schema.js';
import {type PropertyDeclaration} from '../../schema/api/property-declaration.js';
import {type SecretCodec} from '../../secret/api/secret-codec.js';
import {SecretDecodeError} from '../../secret/api/secret-decode-error.js';
import {MultiValueParser} from '../../parser/multi-value-parser.js';
import {type SettingsLogger} from '../../../core/logging/settings-logger.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';

const INT_PATTERN: RegExp = /^[+-]?\d+$/;
const FLOAT_PATTERN: RegExp = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INT_MIN: number = -2_147_483_648;
const INT_MAX: number = 2_147_483_647;

/**
 * A {@link Configuration} over an already assembled property store, checked against the declared property schema.
 *
 * <p>
 * Stored values are decrypted with the secret codec before they are returned or split. Declared defaults are returned
 * as they are declared.
 */
export class DefaultConfiguration implements Configuration {
  private readonly logger: SettingsLogger;

  public constructor(
    private readonly schema: PropertySchema,
    private readonly properties: ReadonlyMap<string, string>,
    private readonly codec: SecretCodec,
    logger?: SettingsLogger,
  ) {
    this.logger = patchInject(logger, InjectTokens.SettingsLogger, DefaultConfiguration.name);
  }

  public get(key: string): string | null {
    const declaration: PropertyDeclaration | null = this.schema.declaration(key);

    if (declaration?.multiValued && this.properties.has(key)) {
      this.logger.warn(
        `Access to the multi-valued property '${key}' should be made using 'getStringArray' method. ` +
          'The plugin using this property should be updated.',
      );
    }

    return this.resolve(key, declaration);
  }

  public getStringArray(key: string): string[] {
    const declaration: PropertyDeclaration | null = this.schema.declaration(key);

    if (declaration && !declaration.multiValued) {
      this.logger.warn(
        `Property '${key}' is not declared as multi-valued but was read using 'getStringArray' method. ` +
          'The plugin declaring this property should be updated.',
      );
    }

    const value: string | null = this.resolve(key, declaration);
    return value === null ? [] : MultiValueParser.parse(key, value);
  }

  public hasKey(key: string): boolean {
    return this.properties.has(key);
  }

  public getBoolean(key: string): boolean | null {
    const value: string | null = this.get(key);
    return value === null ? null : value.trim().toLowerCase() === 'true';
  }

  public getInt(key: string): number | null {
    const value: string | null = this.get(key);
    if (value === null) {
      return null;
    }

    const result: number = Number.parseInt(value.trim(), 10);
    if (!INT_PATTERN.test(value.trim()) || result < INT_MIN || result > INT_MAX) {
      throw new ConfigurationError(`The property '${key}' is not an int value: ${value}`, undefined, {key, value});
    }

    return result;
  }

  public getFloat(key: string): number | null {
    const value: string | null = this.get(key);
    if (value === null) {
      return null;
    }

    const result: number = Number.parseFloat(value.trim());
    if (!FLOAT_PATTERN.test(value.trim()) || !Number.isFinite(result)) {
      throw new ConfigurationError(`The property '${key}' is not a float value: ${value}`, undefined, {key, value});
    }

    return result;
  }

  private resolve(key: string, declaration: PropertyDeclaration | null): string | null {
    const value: string | undefined = this.properties.get(key);

    if (value === undefined) {
      return declaration?.defaultValue ?? null;
    }

    if (!this.codec.isEncrypted(value)) {
      return value;
    }

    try {
      return this.codec.decrypt(value);
    } catch (error) {
      throw new SecretDecodeError(key, error);
    }
  }
}
