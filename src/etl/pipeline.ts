import { NewJob, RawJobPosting } from '../types/job';
import { Logger } from '../utils/logger';
import { topN, FrequencyEntry } from '../analytics/aggregators';
import { removeDuplicates } from './deduplication';
import { normalizeJob, readJobId } from './normalize';

/**
 * Cleans and transforms one fetched page of postings.
 * A posting that fails to normalize is logged and skipped; the batch goes on.
 */
export function processJobs(jobs: readonly RawJobPosting[], logger: Logger): NewJob[] {
  const uniqueJobs = removeDuplicates(jobs);
  const cleanedJobs: NewJob[] = [];

  for (const job of uniqueJobs) {
    try {
      cleanedJobs.push(normalizeJob(job));
    } catch (error) {
      logger.warn('Failed to transform job, skipping', {
        jobId: readJobId(job),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger.info('ETL complete', {
    received: jobs.length,
    unique: uniqueJobs.length,
    cleaned: cleanedJobs.length,
  });

  return cleanedJobs;
}

export interface SkillStatistics {
  total_skills: number;
  unique_skills: number;
  top_skills: FrequencyEntry[];
}

export function getSkillStatistics(jobs: readonly NewJob[]): SkillStatistics {
  const allSkills = jobs.flatMap(job => job.skills);

  return {
    total_skills: allSkills.length,
    unique_skills: new Set(allSkills).size,
    top_skills: topN(allSkills, 20),
  };
}
