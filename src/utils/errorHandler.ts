import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        stack: error.stack,
      });

      // Authentication failures and other non-operational errors abort at once.
      if (!error.isOperational) {
        process.exit(1);
      }
      process.exitCode = 1;
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    // Ledger lines are written before each next search, so stopping here is safe.
    process.on('SIGTERM', () => {
      Logger.info('SIGTERM received, stopping. Run again to resume from the ledger');
      process.exit(143);
    });

    process.on('SIGINT', () => {
      Logger.info('SIGINT received, stopping. Run again to resume from the ledger');
      process.exit(130);
    });
  }
}
