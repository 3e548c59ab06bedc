import type { ErrorRequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import type { EngineFailure, EngineResult } from '../engines/errors';
import type { ApiResponse } from '../types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INTERNAL_ERROR';

function statusToCode(status: number): ErrorCode {
  switch (status) {
    case 400: return 'VALIDATION_ERROR';
    case 401: return 'UNAUTHORIZED';
    case 403: return 'FORBIDDEN';
    case 404: return 'NOT_FOUND';
    case 409: return 'CONFLICT';
    default: return 'INTERNAL_ERROR';
  }
}

export class HttpError extends Error {
  public code: ErrorCode;

  constructor(
    public statusCode: number,
    message: string,
    code?: ErrorCode
  ) {
    super(message);
    this.name = 'HttpError';
    this.code = code ?? statusToCode(statusCode);
  }
}

/** HTTP status for a failed engine call. */
export function statusForFailure(failure: EngineFailure): number {
  if (failure.code.endsWith('NotFound')) return 404;
  switch (failure.category) {
    case 'ValidationError': return 400;
    case 'AuthorizationError': return 403;
    default: return 409;
  }
}

/** Writes an engine result as `{ success, data }` or `{ success, error, code }`. */
export function sendResult<T>(res: Response, result: EngineResult<T>, successStatus = 200): void {
  if (result.success) {
    const body: ApiResponse<T> = { success: true, data: result.data };
    res.status(successStatus).json(body);
    return;
  }
  const body: ApiResponse = {
    success: false,
    error: result.error.message,
    code: result.error.code,
  };
  res.status(statusForFailure(result.error)).json(body);
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  let statusCode = 500;
  let code: string = 'INTERNAL_ERROR';
  let message = 'Internal server error';

  if (err instanceof HttpError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
  } else if (err instanceof ZodError) {
    statusCode = 400;
    code = 'VALIDATION_ERROR';
    message = `Validation error: ${err.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`;
  } else if (err instanceof SyntaxError) {
    // malformed JSON body
    statusCode = 400;
    code = 'VALIDATION_ERROR';
    message = 'Request body is not valid JSON';
  }

  if (statusCode >= 500) {
    console.error('[Error]', err);
  }

  const body: ApiResponse = { success: false, error: message, code };
  res.status(statusCode).json(body);
};
