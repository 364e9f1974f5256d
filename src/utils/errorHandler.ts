import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  /**
   * Metadata for a log line. Keeps stacks for unexpected errors only.
   */
  static describe(error: unknown): Record<string, unknown> {
    if (error instanceof AppError) {
      return {
        name: error.name,
        message: error.message,
        statusCode: error.statusCode,
        retryable: error.retryable,
        context: error.context,
      };
    }
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    return { error: String(error) };
  }

  static isAbort(error: unknown): boolean {
    return (
      typeof error === 'object' &&
      error !== null &&
      'name' in error &&
      (error.name === 'AbortError' || error.name === 'TimeoutError')
    );
  }

  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        ...ErrorHandler.describe(error),
        isOperational: error.isOperational,
        stack: error.stack,
      });

      // Exit for non-operational errors
      if (!error.isOperational) {
        process.exit(1);
      }
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, ErrorHandler.describe(error));
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  static setupGlobalHandlers(onShutdown?: () => void): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason: ErrorHandler.describe(reason) });
      process.exit(1);
    });

    const shutdown = (signal: string) => {
      Logger.info(`${signal} received, shutting down gracefully`);
      onShutdown?.();
      process.exit(0);
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  }
}
