import type { Request, Response, NextFunction } from 'express';

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

// body-parser reports malformed or oversized payloads with a 4xx `status`
const clientErrorStatus = (err: Error): number | null => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
};

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (err instanceof AppError) {
    console.error(`Error: ${err.message}`, { statusCode: err.statusCode, path: req.originalUrl });
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message
    });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    console.warn(`Rejected request to ${req.originalUrl}: ${err.message}`);
    res.status(status).json({
      status: 'error',
      message: status === 400 ? 'Malformed request body' : err.message
    });
    return;
  }

  console.error('Error:', err);
  res.status(500).json({
    status: 'error',
    message: 'Internal server error'
  });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    status: 'error',
    message: `Route ${req.originalUrl} not found`
  });
};
