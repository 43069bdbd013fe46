import { describe, it, expect } from 'vitest';
import { JobFilter, filterRemote, isRemoteJob } from '../src/filters/job-filter';
import { makeJob } from './helpers/jobs';

describe('JobFilter', () => {
  const jobs = [
    makeJob({ id: 'low', salary_min: 40000 }),
    makeJob({ id: 'mid', salary_min: 80000 }),
    makeJob({ id: 'high', salary_min: 150000 }),
    makeJob({ id: 'none', salary_min: 0 }),
  ];

  it('keeps jobs whose lower salary bound is inside the range', () => {
    const filter = new JobFilter({ minSalary: 50000, maxSalary: 100000 });
    expect(filter.filter(jobs, 10).map(job => job.id)).toEqual(['mid']);
  });

  it('treats a zero or missing bound as no limit', () => {
    expect(new JobFilter({}).filter(jobs, 10)).toHaveLength(4);
    expect(new JobFilter({ minSalary: 0, maxSalary: 90000 }).filter(jobs, 10).map(job => job.id)).toEqual([
      'low',
      'mid',
      'none',
    ]);
  });

  it('stops after the limit', () => {
    expect(new JobFilter({}).filter(jobs, 2).map(job => job.id)).toEqual(['low', 'mid']);
  });
});

describe('remote jobs', () => {
  it('matches "remote" in title, description or location regardless of case', () => {
    expect(isRemoteJob(makeJob({ title: 'REMOTE Data Engineer' }))).toBe(true);
    expect(isRemoteJob(makeJob({ description: 'Fully remote team' }))).toBe(true);
    expect(isRemoteJob(makeJob({ location: 'Remote, US' }))).toBe(true);
    expect(isRemoteJob(makeJob())).toBe(false);
  });

  it('returns at most limit remote jobs in order', () => {
    const jobs = [
      makeJob({ id: '1', location: 'Remote' }),
      makeJob({ id: '2' }),
      makeJob({ id: '3', location: 'Remote' }),
      makeJob({ id: '4', location: 'Remote' }),
    ];
    expect(filterRemote(jobs, 2).map(job => job.id)).toEqual(['1', '3']);
  });
});
