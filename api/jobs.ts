import { z } from 'zod';
import type { AppServices } from '../src/services/container';
import { JobFilter } from '../src/filters/job-filter';
import { optionalSalary, optionalText, parseQuery, positiveInt, textWithDefault } from '../src/http/params';
import { Handler } from '../src/http/types';

// Rows read before salary filtering on /jobs/search
const SEARCH_WINDOW = 100;

const listJobsQuery = z.object({
  keyword: optionalText,
  location: optionalText,
  limit: positiveInt(100),
});

const searchJobsQuery = z.object({
  keyword: textWithDefault('data scientist'),
  location: textWithDefault('us'),
  min_salary: optionalSalary,
  max_salary: optionalSalary,
  limit: positiveInt(10),
});

/**
 * GET /jobs
 */
export function listJobs({ store }: Pick<AppServices, 'store'>): Handler {
  return async (req, res) => {
    const { keyword, location, limit } = parseQuery(listJobsQuery, req.query);
    const jobs = await store.findJobs({ keyword, location, limit });
    res.status(200).json({ jobs, count: jobs.length });
  };
}

/**
 * GET /jobs/search
 * Salary bounds apply to salary_min and are checked after the fetch
 */
export function searchJobs({ store }: Pick<AppServices, 'store'>): Handler {
  return async (req, res) => {
    const query = parseQuery(searchJobsQuery, req.query);
    const jobs = await store.findJobs({
      keyword: query.keyword,
      location: query.location,
      limit: SEARCH_WINDOW,
    });

    const filter = new JobFilter({ minSalary: query.min_salary, maxSalary: query.max_salary });
    const filtered = filter.filter(jobs, query.limit);
    res.status(200).json({ jobs: filtered, count: filtered.length });
  };
}

/**
 * GET /jobs/:id
 */
export function getJobById({ store }: Pick<AppServices, 'store'>): Handler {
  return async (req, res) => {
    const jobId = req.params.id ?? '';
    const job = await store.findJobById(jobId);
    if (!job) {
      res.status(404).json({ error: 'Job not found', job_id: jobId });
      return;
    }
    res.status(200).json({ job });
  };
}
