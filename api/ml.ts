import { z } from 'zod';
import type { AppServices } from '../src/services/container';
import { analyzeMarket, recommendSkills } from '../src/analytics/market';
import { optionalText, parseQuery, positiveInt, requiredText, textWithDefault } from '../src/http/params';
import { Handler } from '../src/http/types';
import { ModelUnavailableError, NotFoundError } from '../src/utils/errors';

const predictSalaryQuery = z.object({
  title: requiredText,
  location: requiredText,
  company: requiredText,
});

const classifyJobQuery = z.object({
  title: requiredText,
  description: optionalText,
});

const marketQuery = z.object({
  keyword: textWithDefault('data scientist'),
});

const recommendationsQuery = z.object({
  target_role: requiredText,
  top_n: positiveInt(10),
});

/**
 * POST /ml/predict-salary
 */
export function predictSalary({ models }: Pick<AppServices, 'models'>): Handler {
  return async (req, res) => {
    const { title, location, company } = parseQuery(predictSalaryQuery, req.query);
    if (!models.salaryPredictor) {
      throw new ModelUnavailableError('salary-model');
    }
    res.status(200).json(models.salaryPredictor.predict(title, location, company));
  };
}

/**
 * POST /ml/classify-job
 */
export function classifyJob({ models }: Pick<AppServices, 'models'>): Handler {
  return async (req, res) => {
    const { title, description } = parseQuery(classifyJobQuery, req.query);
    if (!models.jobClassifier) {
      throw new ModelUnavailableError('job-classifier');
    }
    res.status(200).json(models.jobClassifier.classify(title, description ?? ''));
  };
}

/**
 * GET /ml/model-stats
 */
export function getModelStats({ models }: Pick<AppServices, 'models'>): Handler {
  return async (_req, res) => {
    const notLoaded = { error: 'Model not loaded' };
    res.status(200).json({
      salary_model: models.salaryPredictor?.stats() ?? notLoaded,
      job_classifier: models.jobClassifier?.stats() ?? notLoaded,
    });
  };
}

/**
 * GET /ml/market-analysis
 */
export function getMarketAnalysis({ store }: Pick<AppServices, 'store'>): Handler {
  return async (req, res) => {
    const { keyword } = parseQuery(marketQuery, req.query);
    const jobs = await store.findJobs({ keyword, limit: 500 });
    const analysis = analyzeMarket(keyword, jobs);
    if (!analysis) {
      throw new NotFoundError(`No jobs found for '${keyword}'`);
    }
    res.status(200).json(analysis);
  };
}

/**
 * GET /ml/skill-recommendations
 */
export function getSkillRecommendations({ store }: Pick<AppServices, 'store'>): Handler {
  return async (req, res) => {
    const { target_role: targetRole, top_n: topN } = parseQuery(recommendationsQuery, req.query);
    const jobs = await store.findJobs({ keyword: targetRole, limit: 200 });
    const recommendations = recommendSkills(targetRole, jobs, topN);
    if (!recommendations) {
      throw new NotFoundError(`No jobs found for '${targetRole}'`);
    }
    res.status(200).json(recommendations);
  };
}
