import { Response } from 'express';
import { AppError, errorMessage } from '../domain/common/Errors';

/**
 * Send an error as JSON: AppErrors with their own status, anything else as 500.
 */
export function handleError(err: unknown, res: Response) {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json(err.toJSON());
  }
  return res.status(500).json({
    error: true,
    message: errorMessage(err),
    code: 'INTERNAL_ERROR'
  });
}
