// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type SettingsLogger} from '../logging/settings-logger.js';
import {SettingsWinstonLogger} from '../logging/settings-winston-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {DefaultConfigurationProvider} from '../../data/configuration/impl/default-configuration-provider.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | null = null;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to SETTINGS_LOG_LEVEL or 'info'
   * @param logFile - the file to log to, defaults to SETTINGS_LOG_FILE; logs go to stderr when empty
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logLevel: string = constants.DEFAULT_LOG_LEVEL,
    logFile: string = constants.DEFAULT_LOG_FILE,
    testLogger?: SettingsLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<SettingsLogger>(InjectTokens.SettingsLogger).debug('Container already initialized');
      return;
    }

    // SettingsLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.LogFile, {useValue: logFile});
    if (testLogger) {
      container.registerInstance(InjectTokens.SettingsLogger, testLogger);
      container.resolve<SettingsLogger>(InjectTokens.SettingsLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.SettingsLogger, {useClass: SettingsWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<SettingsLogger>(InjectTokens.SettingsLogger).debug('Using default logger');
    }

    container.register(
      InjectTokens.ConfigurationProvider,
      {useClass: DefaultConfigurationProvider},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param logFile - the file to log to
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logLevel?: string, logFile?: string, testLogger?: SettingsLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<SettingsLogger>(InjectTokens.SettingsLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, logFile, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
    Container.isInitialized = false;
  }
}
