import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import {
  getBestLocations,
  getHiringCompanies,
  getRemoteJobs,
  getSalaryStats,
  getSkillStats,
  getTopSkills,
} from '../api/analytics';
import { health, root } from '../api/health';
import { getJobById, listJobs, searchJobs } from '../api/jobs';
import {
  classifyJob,
  getMarketAnalysis,
  getModelStats,
  getSkillRecommendations,
  predictSalary,
} from '../api/ml';
import { refreshJobs } from '../api/refresh';
import { withErrorHandling } from '../src/http/handler';
import { Handler } from '../src/http/types';
import { LoadedModels, loadModels } from '../src/ml';
import { JobStore } from '../src/services/job-store';
import { RefreshService } from '../src/services/refresh';
import { JobSource } from '../src/sources/base';
import { MemoryJobStore } from './helpers/memory-store';
import { createRequest, createResponse } from './helpers/http';
import { createTestLogger } from './helpers/logger';
import { makeStoredJob } from './helpers/jobs';

const jobA = makeStoredJob({
  id: 'a',
  title: 'Data Scientist',
  company: 'Acme',
  location: 'Austin, TX',
  salary_min: 60000,
  salary_max: 100000,
  salary_avg: 80000,
  description: 'Python and SQL',
  skills: ['python', 'sql'],
});
const jobB = makeStoredJob({
  id: 'b',
  title: 'Data Analyst',
  company: 'Acme',
  location: 'Austin, TX',
  salary_min: 90000,
  salary_max: 0,
  salary_avg: 90000,
  description: 'Tableau and SQL',
  skills: ['tableau', 'sql'],
});
const jobC = makeStoredJob({
  id: 'c',
  title: 'ML Engineer',
  company: 'Globex',
  location: 'Houston, TX',
  salary_min: 0,
  salary_max: 140000,
  salary_avg: 140000,
  description: 'Python models',
  skills: ['python'],
});
const jobD = makeStoredJob({
  id: 'd',
  title: 'Data Engineer',
  company: 'Unknown',
  location: 'Remote',
  salary_min: 0,
  salary_max: 0,
  salary_avg: 0,
  description: 'Pipelines',
  skills: [],
});

function seededStore(): MemoryJobStore {
  return new MemoryJobStore([jobA, jobB, jobC, jobD]);
}

async function call(handler: Handler, query: Record<string, unknown> = {}, params: Record<string, string> = {}) {
  const logger = createTestLogger();
  const res = createResponse();
  await withErrorHandling('test', logger, handler)(createRequest(query, params), res);
  return { res, logger };
}

const noModels: LoadedModels = { salaryPredictor: null, jobClassifier: null };
const fixtureModels = (): LoadedModels =>
  loadModels(join(__dirname, 'fixtures/models'), createTestLogger());

describe('health endpoints', () => {
  it('reports liveness', async () => {
    expect((await call(root)).res.body).toEqual({ message: 'Job Market Analyzer API is running!' });
    expect((await call(health)).res.body).toEqual({ status: 'healthy' });
  });
});

describe('jobs endpoints', () => {
  it('lists stored jobs with a default limit of 100', async () => {
    const store = seededStore();
    const { res } = await call(listJobs({ store }));

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ jobs: [jobA, jobB, jobC, jobD], count: 4 });
    expect(store.findCalls).toEqual([{ keyword: undefined, location: undefined, limit: 100 }]);
  });

  it('rejects a non-numeric limit', async () => {
    const { res } = await call(listJobs({ store: seededStore() }), { limit: 'abc' });

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      error: 'Invalid query parameters',
      details: [{ field: 'limit' }],
    });
  });

  it('rejects a zero limit', async () => {
    const { res } = await call(listJobs({ store: seededStore() }), { limit: '0' });
    expect(res.statusCode).toBe(400);
  });

  it('rejects a limit too large to bind as an integer', async () => {
    const store = seededStore();
    const { res } = await call(listJobs({ store }), { limit: '1e21' });

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ details: [{ field: 'limit' }] });
    expect(store.findCalls).toEqual([]);
  });

  it('rejects an out-of-range salary bound', async () => {
    const { res } = await call(searchJobs({ store: seededStore() }), { min_salary: '1e21' });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ details: [{ field: 'min_salary' }] });
  });

  it('searches with default keyword and location', async () => {
    const store = seededStore();
    await call(searchJobs({ store }));
    expect(store.findCalls).toEqual([{ keyword: 'data scientist', location: 'us', limit: 100 }]);
  });

  it('applies salary bounds to the lower salary after the search', async () => {
    const { res } = await call(searchJobs({ store: seededStore() }), {
      keyword: 'data',
      location: 'TX',
      min_salary: '80000',
    });

    expect(res.body).toEqual({ jobs: [jobB], count: 1 });
  });

  it('finds a job by id', async () => {
    const { res } = await call(getJobById({ store: seededStore() }), {}, { id: 'c' });
    expect(res.body).toEqual({ job: jobC });
  });

  it('answers 404 for an unknown id', async () => {
    const { res } = await call(getJobById({ store: seededStore() }), {}, { id: 'zzz' });

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: 'Job not found', job_id: 'zzz' });
  });
});

describe('analytics endpoints', () => {
  it('ranks skills', async () => {
    const { res } = await call(getTopSkills({ store: seededStore() }));

    expect(res.body).toEqual({
      skills: [
        { skill: 'python', count: 2 },
        { skill: 'sql', count: 2 },
        { skill: 'tableau', count: 1 },
      ],
      total_jobs_analyzed: 4,
    });
  });

  it('summarizes skill mentions', async () => {
    const { res } = await call(getSkillStats({ store: seededStore() }), { location: 'austin' });

    expect(res.body).toEqual({
      total_skills: 4,
      unique_skills: 3,
      top_skills: [
        { key: 'sql', count: 2 },
        { key: 'python', count: 1 },
        { key: 'tableau', count: 1 },
      ],
      jobs_analyzed: 2,
    });
  });

  it('ranks hiring companies without unknown employers', async () => {
    const { res } = await call(getHiringCompanies({ store: seededStore() }));

    expect(res.body).toEqual({
      companies: [
        { company: 'Acme', job_count: 2 },
        { company: 'Globex', job_count: 1 },
      ],
      total_companies: 2,
    });
  });

  it('ranks locations', async () => {
    const { res } = await call(getBestLocations({ store: seededStore() }), { limit: '2' });

    expect(res.body).toEqual({
      locations: [
        { location: 'Austin, TX', job_count: 2 },
        { location: 'Houston, TX', job_count: 1 },
      ],
      total_locations: 3,
    });
  });

  it('lists remote jobs', async () => {
    const { res } = await call(getRemoteJobs({ store: seededStore() }));
    expect(res.body).toEqual({ jobs: [jobD], count: 1 });
  });

  it('summarizes salaries over every non-zero bound', async () => {
    const { res } = await call(getSalaryStats({ store: seededStore() }));

    expect(res.body).toEqual({
      keyword: 'all',
      location: 'all',
      min_salary: 60000,
      max_salary: 140000,
      average_salary: 97500,
      median_salary: 100000,
      jobs_analyzed: 4,
    });
  });

  it('says so when there is no salary data', async () => {
    const { res } = await call(getSalaryStats({ store: seededStore() }), { keyword: 'engineer', location: 'remote' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ message: 'No salary data available' });
  });

  it('turns an unexpected failure into a 500', async () => {
    const failing: JobStore = {
      saveJobs: vi.fn(),
      findJobById: vi.fn(),
      findJobs: vi.fn(async () => {
        throw new Error('boom');
      }),
    };

    const { res, logger } = await call(getTopSkills({ store: failing }));

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'Internal server error' });
    expect(logger.error).toHaveBeenCalledWith('test failed', expect.any(Error));
  });
});

describe('refresh endpoint', () => {
  it('runs a refresh with the query and reports the counts', async () => {
    const source: JobSource = {
      name: 'stub',
      fetchJobs: vi.fn(async () => [{ id: 'new-1', title: 'Data Engineer' }, { id: 'a', title: 'Data Scientist' }]),
    };
    const refresh = new RefreshService(source, seededStore(), createTestLogger());

    const { res } = await call(refreshJobs({ refresh }), { keyword: 'ml', results: '5' });

    expect(source.fetchJobs).toHaveBeenCalledWith({ keyword: 'ml', country: 'us', resultsPerPage: 5 });
    expect(res.body).toEqual({
      message: 'Jobs refreshed with ETL processing',
      fetched: 2,
      cleaned: 2,
      saved: 2,
      inserted: 1,
    });
  });
});

describe('model endpoints', () => {
  it('predicts a salary', async () => {
    const { res } = await call(predictSalary({ models: fixtureModels() }), {
      title: 'Data Scientist',
      location: 'New York',
      company: 'Acme',
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      predicted_salary: 105000,
      title: 'Data Scientist',
      location: 'New York',
      company: 'Acme',
    });
  });

  it('answers 400 for a category the model does not know', async () => {
    const { res } = await call(predictSalary({ models: fixtureModels() }), {
      title: 'Data Scientist',
      location: 'New York',
      company: 'Initech',
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: "Prediction failed: unknown company 'Initech'",
      details: { feature: 'company', value: 'Initech' },
    });
  });

  it('requires every salary input', async () => {
    const { res } = await call(predictSalary({ models: fixtureModels() }), { title: 'Data Scientist' });
    expect(res.statusCode).toBe(400);
  });

  it('answers 503 when a model is not loaded', async () => {
    const salary = await call(predictSalary({ models: noModels }), { title: 'a', location: 'b', company: 'c' });
    const classify = await call(classifyJob({ models: noModels }), { title: 'a' });

    expect(salary.res.statusCode).toBe(503);
    expect(salary.res.body).toEqual({ error: "Model 'salary-model' is not loaded" });
    expect(classify.res.statusCode).toBe(503);
    expect(classify.res.body).toEqual({ error: "Model 'job-classifier' is not loaded" });
  });

  it('classifies a job', async () => {
    const { res } = await call(classifyJob({ models: fixtureModels() }), {
      title: 'Data Analyst',
      description: 'Build dashboards and reports',
    });

    expect(res.body).toEqual({
      predicted_category: 'Data Analyst',
      confidence: { 'Data Analyst': 90, 'ML Engineer': 10 },
      title: 'Data Analyst',
    });
  });

  it('reports model stats', async () => {
    const loaded = await call(getModelStats({ models: fixtureModels() }));
    const missing = await call(getModelStats({ models: noModels }));

    expect(loaded.res.body).toMatchObject({
      salary_model: { num_trees: 2, unique_companies: 2 },
      job_classifier: { categories: ['Data Analyst', 'ML Engineer'], vocabulary_size: 5 },
    });
    expect(missing.res.body).toEqual({
      salary_model: { error: 'Model not loaded' },
      job_classifier: { error: 'Model not loaded' },
    });
  });

  it('analyzes the market for a keyword', async () => {
    const { res } = await call(getMarketAnalysis({ store: seededStore() }), { keyword: 'austin' });
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: "No jobs found for 'austin'" });

    const found = await call(getMarketAnalysis({ store: seededStore() }), { keyword: 'data' });
    expect(found.res.statusCode).toBe(200);
    expect(found.res.body).toMatchObject({
      keyword: 'data',
      total_jobs: 3,
      top_companies: [{ company: 'Acme', jobs: 2 }],
    });
  });

  it('recommends skills for a role', async () => {
    const { res } = await call(getSkillRecommendations({ store: seededStore() }), {
      target_role: 'analyst',
      top_n: '2',
    });

    expect(res.body).toEqual({
      target_role: 'analyst',
      jobs_analyzed: 1,
      recommended_skills: [
        { skill: 'sql', frequency: 1, percentage: 100 },
        { skill: 'tableau', frequency: 1, percentage: 100 },
      ],
      message: 'Top 2 skills for analyst roles',
    });
  });

  it('requires a target role', async () => {
    const { res } = await call(getSkillRecommendations({ store: seededStore() }));
    expect(res.statusCode).toBe(400);
  });
});
