import { Handler } from '../src/http/types';

/**
 * GET /
 */
export const root: Handler = async (_req, res) => {
  res.status(200).json({ message: 'Job Market Analyzer API is running!' });
};

/**
 * GET /health
 */
export const health: Handler = async (_req, res) => {
  res.status(200).json({ status: 'healthy' });
};
