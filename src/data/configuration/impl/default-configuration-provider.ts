// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ConfigurationProvider} from '../api/configuration-provider.js';
import {type ConfigurationBuilder} from '../api/configuration-builder.js';
import {DefaultConfigurationBuilder} from './default-configuration-builder.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type SettingsLogger} from '../../../core/logging/settings-logger.js';

@injectable()
export class DefaultConfigurationProvider implements ConfigurationProvider {
  private readonly logger: SettingsLogger;

  public constructor(@inject(InjectTokens.SettingsLogger) logger?: SettingsLogger) {
    this.logger = patchInject(logger, InjectTokens.SettingsLogger, DefaultConfigurationProvider.name);
  }

  public builder(): ConfigurationBuilder {
    return new DefaultConfigurationBuilder(this.logger);
  }
}
