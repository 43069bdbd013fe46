import { NewJob } from '../types/job';
import { UNKNOWN } from '../etl/normalize';

export interface FrequencyEntry {
  key: string;
  count: number;
}

export interface SalaryStats {
  min: number;
  max: number;
  average: number;
  median: number;
  count: number;
}

/**
 * Counts occurrences and returns the `limit` most frequent keys.
 * Equal counts keep the order in which the keys were first seen.
 */
export function topN(keys: Iterable<string>, limit: number): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so ties stay in insertion order
  return [...counts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit));
}

/**
 * Every non-zero salary bound across the jobs, in job order
 */
export function collectSalaries(jobs: readonly NewJob[]): number[] {
  const salaries: number[] = [];
  for (const job of jobs) {
    if (job.salary_min > 0) salaries.push(job.salary_min);
    if (job.salary_max > 0) salaries.push(job.salary_max);
  }
  return salaries;
}

/**
 * Summary over the multiset of all salary bounds.
 * The median is the element at index floor(n / 2) of the sorted values,
 * i.e. the upper-middle one for even counts; it is never averaged.
 */
export function salaryStats(jobs: readonly NewJob[]): SalaryStats | null {
  const salaries = collectSalaries(jobs).sort((a, b) => a - b);
  if (salaries.length === 0) return null;

  const count = salaries.length;
  const sum = salaries.reduce((total, value) => total + value, 0);

  return {
    min: salaries[0],
    max: salaries[count - 1],
    average: Math.floor(sum / count),
    median: salaries[Math.floor(count / 2)],
    count,
  };
}

function isKnown(name: string): boolean {
  return name.length > 0 && name !== UNKNOWN;
}

export function topSkills(jobs: readonly NewJob[], limit: number): FrequencyEntry[] {
  return topN(jobs.flatMap(job => job.skills), limit);
}

export interface RankedNames {
  top: FrequencyEntry[];
  distinct: number;
}

function rankNames(names: string[], limit: number): RankedNames {
  const known = names.filter(isKnown);
  return {
    top: topN(known, limit),
    distinct: new Set(known).size,
  };
}

export function topCompanies(jobs: readonly NewJob[], limit: number): RankedNames {
  return rankNames(jobs.map(job => job.company), limit);
}

export function topLocations(jobs: readonly NewJob[], limit: number): RankedNames {
  return rankNames(jobs.map(job => job.location), limit);
}
