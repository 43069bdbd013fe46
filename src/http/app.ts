import express, { Express, NextFunction, Request, Response, Router } from 'express';
import { getBestLocations, getHiringCompanies, getRemoteJobs, getSalaryStats, getSkillStats, getTopSkills } from '../../api/analytics';
import { health, root } from '../../api/health';
import { getJobById, listJobs, searchJobs } from '../../api/jobs';
import { classifyJob, getMarketAnalysis, getModelStats, getSkillRecommendations, predictSalary } from '../../api/ml';
import { refreshJobs } from '../../api/refresh';
import type { AppServices } from '../services/container';
import { withErrorHandling } from './handler';
import { Handler } from './types';

type Method = 'get' | 'post';

// express tags errors it raises while parsing a request (a malformed
// percent-encoded path, for one) with a 4xx `status`
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Builds the express application over the given services
 */
export function createApp(services: AppServices): Express {
  const app = express();
  const router = Router();
  const logger = services.logger.child('http');

  const route = (method: Method, path: string, handler: Handler): void => {
    const wrapped = withErrorHandling(`${method.toUpperCase()} ${path}`, logger, handler);
    const middleware = (req: Request, res: Response, next: NextFunction): void => {
      wrapped(req, res).catch(next);
    };
    if (method === 'get') {
      router.get(path, middleware);
    } else {
      router.post(path, middleware);
    }
  };

  route('get', '/', root);
  route('get', '/health', health);

  // /jobs/search must be registered before /jobs/:id
  route('get', '/jobs', listJobs(services));
  route('get', '/jobs/search', searchJobs(services));
  route('get', '/jobs/:id', getJobById(services));

  route('get', '/skills/top', getTopSkills(services));
  route('get', '/skills/stats', getSkillStats(services));
  route('get', '/companies/hiring', getHiringCompanies(services));
  route('get', '/locations/best', getBestLocations(services));
  route('get', '/remote', getRemoteJobs(services));
  route('get', '/salaries/stats', getSalaryStats(services));

  route('post', '/refresh', refreshJobs(services));

  route('post', '/ml/predict-salary', predictSalary(services));
  route('post', '/ml/classify-job', classifyJob(services));
  route('get', '/ml/model-stats', getModelStats(services));
  route('get', '/ml/market-analysis', getMarketAnalysis(services));
  route('get', '/ml/skill-recommendations', getSkillRecommendations(services));

  app.use(router);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== null) {
      logger.warn('Malformed request', {
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(status).json({ error: 'Bad request' });
      return;
    }

    logger.error('Unhandled request error', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
