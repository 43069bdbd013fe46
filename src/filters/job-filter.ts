import { NewJob } from '../types/job';

export interface SalaryCriteria {
  minSalary?: number;
  maxSalary?: number;
}

/**
 * Filters stored jobs by the lower bound of their advertised salary.
 * A criterion of 0 (or none) is treated as "no limit".
 */
export class JobFilter {
  constructor(private criteria: SalaryCriteria) {}

  /**
   * Checks if a job matches the salary criteria
   */
  matches(job: NewJob): boolean {
    const salary = job.salary_min;
    const { minSalary, maxSalary } = this.criteria;

    if (minSalary && salary < minSalary) return false;
    if (maxSalary && salary > maxSalary) return false;

    return true;
  }

  /**
   * Filters an array of jobs, stopping once `limit` matches are found
   */
  filter<T extends NewJob>(jobs: readonly T[], limit: number): T[] {
    return takeMatching(jobs, job => this.matches(job), limit);
  }
}

export function isRemoteJob(job: NewJob): boolean {
  return [job.title, job.description, job.location].some(field =>
    field.toLowerCase().includes('remote')
  );
}

export function filterRemote<T extends NewJob>(jobs: readonly T[], limit: number): T[] {
  return takeMatching(jobs, isRemoteJob, limit);
}

function takeMatching<T>(items: readonly T[], predicate: (item: T) => boolean, limit: number): T[] {
  const matched: T[] = [];
  for (const item of items) {
    if (matched.length >= limit) break;
    if (predicate(item)) matched.push(item);
  }
  return matched;
}
