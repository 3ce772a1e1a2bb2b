import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ---------------------------------------------------------------------------
// Alignment errors
// ---------------------------------------------------------------------------

export type AlignmentErrorCode = 'INPUT_EMPTY' | 'NO_TIME_SOURCE' | 'MALFORMED_FRAGMENT';

export class AlignmentError extends AppError {
  declare readonly code: AlignmentErrorCode;

  constructor(message: string, code: AlignmentErrorCode, statusCode: number) {
    super(message, statusCode, code);
  }
}

/** The reference script produced no tokens after normalization. */
export class InputEmptyError extends AlignmentError {
  constructor(message = 'Reference script contains no words to align') {
    super(message, 'INPUT_EMPTY', 422);
  }
}

/**
 * Reference tokens exist but there is no hypothesis timing at all. Callers
 * decide whether to fall back to uniform spacing.
 */
export class NoTimeSourceError extends AlignmentError {
  public readonly tokenCount: number;

  constructor(tokenCount: number) {
    super(`No hypothesis fragments supplied for ${tokenCount} reference tokens`, 'NO_TIME_SOURCE', 422);
    this.tokenCount = tokenCount;
  }
}

export class MalformedFragmentError extends AlignmentError {
  public readonly fragmentIndex: number;

  constructor(fragmentIndex: number, reason: string) {
    super(`Malformed hypothesis fragment at index ${fragmentIndex}: ${reason}`, 'MALFORMED_FRAGMENT', 400);
    this.fragmentIndex = fragmentIndex;
  }
}

// ---------------------------------------------------------------------------
// Express glue
// ---------------------------------------------------------------------------

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Wrap an async controller so rejections reach the error handler.
 */
export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction): Promise<void> =>
    fn(req, res, next).catch(next);
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${err.message}`, { stack: err.stack });
    } else {
      logger.warn(`${req.method} ${req.path} rejected: ${err.message}`, { code: err.code });
    }

    res.status(err.statusCode).json({
      success: false,
      message: err.message,
      ...(err.code ? { code: err.code } : {}),
    });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.path}:`, { error: err.message, stack: err.stack });

  res.status(500).json({
    success: false,
    message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
  });
};
