import { z } from 'zod';
import type { AppServices } from '../src/services/container';
import { salaryStats, topCompanies, topLocations, topSkills } from '../src/analytics/aggregators';
import { getSkillStatistics } from '../src/etl/pipeline';
import { filterRemote } from '../src/filters/job-filter';
import { optionalText, parseQuery, positiveInt } from '../src/http/params';
import { Handler } from '../src/http/types';

type StoreServices = Pick<AppServices, 'store'>;

// Aggregates are computed over at most this many stored jobs
export const ANALYSIS_WINDOW = 200;

const limitQuery = (defaultLimit: number) =>
  z.object({
    keyword: optionalText,
    location: optionalText,
    limit: positiveInt(defaultLimit),
  });

const filterQuery = z.object({
  keyword: optionalText,
  location: optionalText,
});

/**
 * GET /skills/top
 */
export function getTopSkills({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { limit } = parseQuery(limitQuery(20), req.query);
    const jobs = await store.findJobs({ limit: ANALYSIS_WINDOW });
    res.status(200).json({
      skills: topSkills(jobs, limit).map(({ key, count }) => ({ skill: key, count })),
      total_jobs_analyzed: jobs.length,
    });
  };
}

/**
 * GET /skills/stats
 */
export function getSkillStats({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { keyword, location } = parseQuery(filterQuery, req.query);
    const jobs = await store.findJobs({ keyword, location, limit: ANALYSIS_WINDOW });
    res.status(200).json({ ...getSkillStatistics(jobs), jobs_analyzed: jobs.length });
  };
}

/**
 * GET /companies/hiring
 */
export function getHiringCompanies({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { keyword, location, limit } = parseQuery(limitQuery(10), req.query);
    const jobs = await store.findJobs({ keyword, location, limit: ANALYSIS_WINDOW });
    const ranked = topCompanies(jobs, limit);
    res.status(200).json({
      companies: ranked.top.map(({ key, count }) => ({ company: key, job_count: count })),
      total_companies: ranked.distinct,
    });
  };
}

/**
 * GET /locations/best
 */
export function getBestLocations({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { keyword, limit } = parseQuery(limitQuery(10), req.query);
    const jobs = await store.findJobs({ keyword, limit: ANALYSIS_WINDOW });
    const ranked = topLocations(jobs, limit);
    res.status(200).json({
      locations: ranked.top.map(({ key, count }) => ({ location: key, job_count: count })),
      total_locations: ranked.distinct,
    });
  };
}

/**
 * GET /remote
 */
export function getRemoteJobs({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { keyword, limit } = parseQuery(limitQuery(10), req.query);
    const jobs = await store.findJobs({ keyword, limit: ANALYSIS_WINDOW });
    const remote = filterRemote(jobs, limit);
    res.status(200).json({ jobs: remote, count: remote.length });
  };
}

/**
 * GET /salaries/stats
 */
export function getSalaryStats({ store }: StoreServices): Handler {
  return async (req, res) => {
    const { keyword, location } = parseQuery(filterQuery, req.query);
    const jobs = await store.findJobs({ keyword, location, limit: ANALYSIS_WINDOW });
    const stats = salaryStats(jobs);

    if (!stats) {
      res.status(200).json({ message: 'No salary data available' });
      return;
    }

    res.status(200).json({
      keyword: keyword ?? 'all',
      location: location ?? 'all',
      min_salary: stats.min,
      max_salary: stats.max,
      average_salary: stats.average,
      median_salary: stats.median,
      jobs_analyzed: jobs.length,
    });
  };
}
