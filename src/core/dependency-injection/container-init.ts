// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type BinderLogger} from '../logging/binder-logger.js';
import {BinderWinstonLogger} from '../logging/binder-winston-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {ConfigKeyFormatter} from '../../data/key/config-key-formatter.js';
import {InMemoryDeferredEngine} from '../../data/deferred/in-memory-deferred-engine.js';
import {FieldDescriptorResolver} from '../../data/binder/impl/field-descriptor-resolver.js';
import {ScalarBinder} from '../../data/binder/impl/scalar-binder.js';
import {StructuralBinder} from '../../data/binder/impl/structural-binder.js';
import {ConfigBinder} from '../../data/binder/impl/config-binder.js';
import {DisplaySerializer} from '../../data/binder/impl/display-serializer.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

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
   * @param logLevel - the log level to use, defaults to constants.BINDER_LOG_LEVEL
   * @param logFile - the file to write log entries to, the console is used when empty
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logLevel: string = constants.BINDER_LOG_LEVEL,
    logFile: string = constants.BINDER_LOG_FILE,
    testLogger?: BinderLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<BinderLogger>(InjectTokens.BinderLogger).debug('Container already initialized');
      return;
    }

    // BinderLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.LogFile, {useValue: logFile});
    if (testLogger) {
      container.registerInstance(InjectTokens.BinderLogger, testLogger);
      container.resolve<BinderLogger>(InjectTokens.BinderLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.BinderLogger, {useClass: BinderWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<BinderLogger>(InjectTokens.BinderLogger).debug('Using default logger');
    }

    // Keys and deferred values
    container.register(InjectTokens.KeyFormatter, {useValue: ConfigKeyFormatter.instance()});
    container.register(
      InjectTokens.DeferredEngine,
      {useClass: InMemoryDeferredEngine},
      {lifecycle: Lifecycle.Singleton},
    );

    // Binder
    container.register(
      InjectTokens.FieldDescriptorResolver,
      {useClass: FieldDescriptorResolver},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ScalarBinder, {useClass: ScalarBinder}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.StructuralBinder, {useClass: StructuralBinder}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ConfigBinder, {useClass: ConfigBinder}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.DisplaySerializer,
      {useClass: DisplaySerializer},
      {lifecycle: Lifecycle.Singleton},
    );

    container.resolve<BinderLogger>(InjectTokens.BinderLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use, defaults to constants.BINDER_LOG_LEVEL
   * @param logFile - the file to write log entries to, the console is used when empty
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logLevel?: string, logFile?: string, testLogger?: BinderLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<BinderLogger>(InjectTokens.BinderLogger).debug('Resetting container');
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
  }
}
