import {
  AppError,
  ErrorResponse,
  InternalError,
  NetworkError,
  TimeoutError,
  ValidationError
} from './AppError';
import { ILogger, LoggerFactory } from '../logging/Logger';

/**
 * Global error handler
 */
export class ErrorHandler {
  private static instance: ErrorHandler | undefined;

  private constructor(private logger: ILogger) {}

  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler(LoggerFactory.getLogger('ErrorHandler'));
    }
    return ErrorHandler.instance;
  }

  /**
   * Log and convert to a serialisable response
   */
  handle(error: unknown): ErrorResponse {
    const appError = this.normalizeError(error);

    this.logError(appError);

    return appError.toJSON();
  }

  /**
   * Normalize error to AppError
   */
  normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (!(error instanceof Error)) {
      return new InternalError(String(error));
    }

    if (error.name === 'ValidationError') {
      return new ValidationError(error.message);
    }

    if (error.message.includes('ECONNREFUSED')) {
      return new NetworkError('Connection refused', { originalError: error.message });
    }

    if (error.message.includes('ETIMEDOUT')) {
      return new TimeoutError('Network request', 30000);
    }

    return new InternalError(error.message, {
      originalError: error.name,
      stack: error.stack
    });
  }

  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.error(`[${error.code}] ${error.message}`, undefined, error.details);
    } else {
      this.logger.error('Non-operational error', error, error.details);
    }
  }
}
