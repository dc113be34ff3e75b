// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export {SettingsError} from './core/errors/settings-error.js';
export {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
export {UnsupportedOperationError} from './core/errors/unsupported-operation-error.js';
export {type LogMeta, type SettingsLogger} from './core/logging/settings-logger.js';
export {SettingsWinstonLogger} from './core/logging/settings-winston-logger.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {Container} from './core/dependency-injection/container-init.js';

export {type Configuration} from './data/configuration/api/configuration.js';
export {type ConfigurationBuilder} from './data/configuration/api/configuration-builder.js';
export {type ConfigurationProvider} from './data/configuration/api/configuration-provider.js';
export {ConfigurationError} from './data/configuration/api/configuration-error.js';
export {DefaultConfiguration} from './data/configuration/impl/default-configuration.js';
export {DefaultConfigurationBuilder} from './data/configuration/impl/default-configuration-builder.js';
export {DefaultConfigurationProvider} from './data/configuration/impl/default-configuration-provider.js';

export {PropertyDeclaration, PropertyDeclarationBuilder} from './data/schema/api/property-declaration.js';
export {type PropertySchema} from './data/schema/api/property-schema.js';
export {DeclaredPropertySchema} from './data/schema/impl/declared-property-schema.js';

export {MultiValueParser} from './data/parser/multi-value-parser.js';
export {MalformedMultiValueError} from './data/parser/malformed-multi-value-error.js';

export {type SecretCodec} from './data/secret/api/secret-codec.js';
export {type Cipher} from './data/secret/api/cipher.js';
export {SecretDecodeError} from './data/secret/api/secret-decode-error.js';
export {PrefixedSecretCodec} from './data/secret/impl/prefixed-secret-codec.js';
export {Base64Cipher} from './data/secret/impl/base64-cipher.js';
