import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import type { Config } from '../config/types.js';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';

type LogMeta = Record<string, unknown>;

const fileFormat = () =>
  winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json());

export class Logger {
  private static instance: Logger;
  private logger: winston.Logger;

  private constructor() {
    const config = ConfigManager.getInstance().getConfig();
    this.logger = this.createLogger(config.logging);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private createLogger(loggingConfig: Config['logging']): winston.Logger {
    // stderr is reserved for the progress line, so only warnings and errors go there
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn'],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta, errorReplacer)}` : '';
            return `${String(timestamp)} [${String(level)}]: ${String(message)}${metaStr}`;
          })
        ),
      }),
    ];

    if (loggingConfig.file) {
      transports.push(new winston.transports.File({ filename: loggingConfig.file, format: fileFormat() }));
    }

    return winston.createLogger({
      level: loggingConfig.level,
      transports,
    });
  }

  public async setLogFile(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });

    const fileTransport = this.logger.transports.find(
      (transport) => transport instanceof winston.transports.File
    );
    if (fileTransport) {
      this.logger.remove(fileTransport);
    }

    this.logger.add(new winston.transports.File({ filename: filepath, format: fileFormat() }));
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public setLevel(level: Config['logging']['level']): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

// Error instances have no enumerable fields, so JSON.stringify would print {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const logger = (): Logger => Logger.getInstance();
export const error = (message: string, meta?: LogMeta): void =>
  logger().error(message, meta);
export const warn = (message: string, meta?: LogMeta): void =>
  logger().warn(message, meta);
export const info = (message: string, meta?: LogMeta): void =>
  logger().info(message, meta);
export const debug = (message: string, meta?: LogMeta): void =>
  logger().debug(message, meta);
