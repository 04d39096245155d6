import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import type { Config } from '../config/types.js';

type Meta = Record<string, unknown>;

// stdout is reserved for status lines and the summary
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${String(level)}]: ${String(message)}${metaStr}`;
  })
);

function createTransports(loggingConfig: Config['logging']): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: STDERR_LEVELS, format: consoleFormat }),
  ];

  if (loggingConfig.file) {
    transports.push(
      new winston.transports.File({
        filename: loggingConfig.file,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return transports;
}

export class Logger {
  private static instance: Logger;
  private readonly logger: winston.Logger;

  private constructor() {
    const { logging } = ConfigManager.getInstance().getConfig();
    this.logger = winston.createLogger({
      level: logging.level,
      transports: createTransports(logging),
    });
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public error(message: string, meta?: Meta): void {
    this.logger.error(message, meta);
  }

  public info(message: string, meta?: Meta): void {
    this.logger.info(message, meta);
  }

  public debug(message: string, meta?: Meta): void {
    this.logger.debug(message, meta);
  }

  /** Underlying winston instance, for inspecting transports. */
  public getLogger(): winston.Logger {
    return this.logger;
  }
}

export const logger = (): Logger => Logger.getInstance();
export const error = (message: string, meta?: Meta): void => logger().error(message, meta);
export const info = (message: string, meta?: Meta): void => logger().info(message, meta);
export const debug = (message: string, meta?: Meta): void => logger().debug(message, meta);
