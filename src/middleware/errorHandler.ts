import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ForeignKeyConstraintError, OptimisticLockError, UniqueConstraintError } from 'sequelize';
import { isAppError } from '../utils/errors.js';

interface ErrorPayload {
  message: string;
  code: string;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  // Normalize error
  let status = 500;
  let payload: ErrorPayload = { message: 'Internal Server Error', code: 'internal_error' };

  if (isAppError(err)) {
    status = err.status;
    payload = { message: err.message, code: err.code };
  } else if (err instanceof ZodError) {
    // Map Zod validation to 400
    const issue = err.issues[0];
    status = 400;
    payload = { message: issue ? `${issue.path.join('.') || 'request'}: ${issue.message}` : 'Invalid request', code: 'bad_request' };
  } else if (err instanceof UniqueConstraintError) {
    status = 409;
    payload = { message: 'Duplicate entry', code: 'conflict' };
  } else if (err instanceof ForeignKeyConstraintError) {
    status = 409;
    payload = { message: 'Referenced record does not exist', code: 'conflict' };
  } else if (err instanceof OptimisticLockError) {
    status = 409;
    payload = { message: 'The record was changed by another request; try again', code: 'conflict' };
  } else if (err instanceof SyntaxError && 'body' in err) {
    // express.json() on a malformed body
    status = 400;
    payload = { message: 'Malformed JSON body', code: 'bad_request' };
  }

  // Log detailed error on server only
  if (status >= 500) {
    console.error('[errorHandler]', { status, message: err instanceof Error ? err.message : String(err), stack: err instanceof Error ? err.stack : undefined });
  } else {
    console.warn('[errorHandler]', { status, code: payload.code, message: payload.message });
  }
  res.status(status).json(payload);
}
