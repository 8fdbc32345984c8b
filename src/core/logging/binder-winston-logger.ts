// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type BinderLogger} from './binder-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE [traceId]
  winston.format.printf(data => `${data.timestamp}|${data.level}| ${data.message} [${data.traceId}]`),
);

@injectable()
export class BinderWinstonLogger implements BinderLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;

  /**
   * @param logLevel - the log level to use
   * @param logFile - the file to append log entries to, the console is used when empty
   */
  public constructor(@inject(InjectTokens.LogLevel) logLevel?: string, @inject(InjectTokens.LogFile) logFile?: string) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    logFile = patchInject(logFile, InjectTokens.LogFile, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: customFormat,
      transports: [
        logFile
          ? new winston.transports.File({filename: logFile})
          : new winston.transports.Console({stderrLevels: ['error', 'warn', 'info', 'debug']}),
      ],
    });
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: object = {}): object {
    return {...meta, traceId: this.traceId};
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_, this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }
}
