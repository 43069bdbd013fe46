import { AppError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Handler } from './types';

/**
 * Maps thrown errors to responses: AppError to its own status,
 * anything else to a generic 500
 */
export function withErrorHandling(name: string, logger: Logger, handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      if (error instanceof AppError) {
        if (error.statusCode >= 500) {
          logger.error(`${name} failed`, error);
        } else {
          logger.warn(`${name} rejected`, { status: error.statusCode, error: error.message });
        }
        const body: Record<string, unknown> = { error: error.message };
        if (error.details !== undefined) body.details = error.details;
        res.status(error.statusCode).json(body);
        return;
      }

      logger.error(`${name} failed`, error);
      res.status(500).json({ error: 'Internal server error' });
    }
  };
}
