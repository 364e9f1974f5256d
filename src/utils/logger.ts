import winston from 'winston';
import { config } from '../config/index.js';
import type { LoggingConfig } from '../types/index.js';

const SERVICE_LABEL = 'track-relay';

const textLine = winston.format.printf(({ timestamp, level, message, label, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}] ${String(label)}: ${String(message)}${metaStr}`;
});

function consoleFormat(format: LoggingConfig['format']): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.json();
  }
  return winston.format.combine(winston.format.colorize(), textLine);
}

export class Logger {
  private static instance: winston.Logger;

  static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: config.logging.level,
        format: winston.format.combine(
          winston.format.label({ label: SERVICE_LABEL }),
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.errors({ stack: true })
        ),
        transports: [
          new winston.transports.Console({
            stderrLevels: ['error'],
            format: consoleFormat(config.logging.format),
          }),
        ],
      });
    }

    return Logger.instance;
  }

  static info(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().info(message, meta);
  }

  static warn(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().warn(message, meta);
  }

  static error(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().error(message, meta);
  }

  static debug(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().debug(message, meta);
  }
}
