/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

/**
 * Raised at construction time for out-of-range settings. Never clamped.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'CONFIGURATION_ERROR', 500, false, field ? { field } : undefined);
  }
}

/**
 * Remote endpoint asked the caller to stay away for a fixed period
 */
export class FloodWaitError extends AppError {
  constructor(public readonly seconds: number, message?: string) {
    super(
      message ?? `A wait of ${seconds} seconds is required`,
      'FLOOD_WAIT',
      429,
      true,
      { seconds }
    );
  }
}

export class NetworkError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', 503, true, details);
  }
}

export class PermissionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERMISSION_DENIED', 403, true, details);
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeout: number) {
    super(
      `Operation '${operation}' timed out after ${timeout}ms`,
      'TIMEOUT',
      504,
      true,
      { operation, timeout }
    );
  }
}

/**
 * A fetch reported success but left no usable file behind
 */
export class IncompleteDownloadError extends AppError {
  constructor(public readonly destinationPath: string) {
    super(
      `File is missing or empty after download: ${destinationPath}`,
      'INCOMPLETE_DOWNLOAD',
      502,
      true,
      { destinationPath }
    );
  }
}

/**
 * Raised to the caller when a stop signal interrupts a download run
 */
export class CancelledError extends AppError {
  constructor(
    message: string = 'Download run was cancelled',
    public readonly taskIds: string[] = [],
    public readonly destinationPaths: string[] = []
  ) {
    super(message, 'CANCELLED', 499, true, { taskIds, destinationPaths });
  }
}

export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', 500, false, details);
  }
}
