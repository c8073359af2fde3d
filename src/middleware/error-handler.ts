import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types.js';

import {
  AppError,
  GateError,
  MethodNotAllowedError,
} from '../errors/app-error.js';

import { logError } from '../services/logger.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const isAppError = err instanceof AppError;
  const statusCode = isAppError ? err.statusCode : 500;
  const code = isAppError ? err.code : 'INTERNAL_ERROR';
  const message = isAppError ? err.message : 'Internal Server Error';

  // Gate rejections are already logged at warn by the gate.
  if (!(err instanceof GateError)) {
    logError(
      `HTTP ${statusCode}: ${err.message} - ${req.method} ${req.path}`,
      err
    );
  }

  const response: ErrorResponse = {
    error: {
      message,
      code,
      statusCode,
    },
  };

  if (process.env.NODE_ENV === 'development') {
    response.error.stack = err.stack;
  }

  if (err instanceof MethodNotAllowedError) {
    res.setHeader('Allow', err.allow);
  }

  res.status(statusCode).json(response);
}
