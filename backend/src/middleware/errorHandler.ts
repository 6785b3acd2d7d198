import { Request, Response, NextFunction } from 'express';
import { logError, logger } from '../utils/logger';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Not enough labeled cases to compile a specialization.
 * Never downgraded to "compile with fewer".
 */
export class InsufficientDataError extends AppError {
  constructor(
    public readonly specialization: string,
    public readonly available: number,
    public readonly required: number
  ) {
    super(
      `Specialization "${specialization}" has ${available} labeled cases, ${required} required`,
      422,
      'INSUFFICIENT_DATA'
    );
  }
}

/**
 * The classifier failed, timed out or was cancelled. Callers must never read
 * this as a low-acuity answer.
 */
export class ClassificationUnavailableError extends AppError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 503, 'CLASSIFICATION_UNAVAILABLE');
  }
}

export class CompilationAbortedError extends AppError {
  constructor(public readonly specialization: string) {
    super(`Compilation of "${specialization}" was aborted`, 503, 'COMPILATION_ABORTED');
  }
}

export class UnknownSpecializationError extends AppError {
  constructor(public readonly specialization: string) {
    super(`Specialization "${specialization}" not found`, 404, 'UNKNOWN_SPECIALIZATION');
  }
}

export class InvalidConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'INVALID_CONFIGURATION');
  }
}

// Express error middleware (must be registered last)
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logError(`${req.method} ${req.path} failed`, err, { code: err.code });
    } else {
      logger.warn(`${req.method} ${req.path} rejected`, { code: err.code, statusCode: err.statusCode });
    }

    res.status(err.statusCode).json({
      status: 'error',
      code: err.code,
      message: err.message,
    });
    return;
  }

  // body-parser rejections (malformed JSON, oversized payload) carry a 4xx status
  const status = 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    logger.warn(`${req.method} ${req.path} rejected`, { statusCode: status, error: err.message });
    res.status(status).json({
      status: 'error',
      code: 'INVALID_REQUEST',
      message: err.message,
    });
    return;
  }

  logError(`${req.method} ${req.path} failed`, err);
  res.status(500).json({
    status: 'error',
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  });
}
