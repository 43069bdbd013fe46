import { NewJob, StoredJob } from '../types/job';
import { ConnectionSource, withClient } from '../db/client';
import { JobQuery, JobsRepository, SaveResult } from '../db/jobs';
import { Logger } from '../utils/logger';

export type { JobQuery, SaveResult };

/**
 * Read/write access to the canonical job records.
 * Implementations never reject: an unavailable store reads as empty and
 * saves nothing.
 */
export interface JobStore {
  saveJobs(jobs: readonly NewJob[]): Promise<SaveResult>;
  findJobs(query: JobQuery): Promise<StoredJob[]>;
  findJobById(id: string): Promise<StoredJob | null>;
}

export class PgJobStore implements JobStore {
  constructor(
    private readonly connections: ConnectionSource,
    private readonly jobsRepo: JobsRepository,
    private readonly logger: Logger
  ) {}

  async saveJobs(jobs: readonly NewJob[]): Promise<SaveResult> {
    if (jobs.length === 0) {
      return { attempted: 0, inserted: 0, duplicates: 0, failed: 0 };
    }

    try {
      const result = await withClient(this.connections, client =>
        this.jobsRepo.insertJobsIfNotExists(client, jobs)
      );
      this.logger.info('Jobs saved', { ...result });
      return result;
    } catch (error) {
      this.logger.error('Error saving jobs', error, { count: jobs.length });
      return { attempted: jobs.length, inserted: 0, duplicates: 0, failed: jobs.length };
    }
  }

  async findJobs(query: JobQuery): Promise<StoredJob[]> {
    try {
      return await withClient(this.connections, client => this.jobsRepo.findJobs(client, query));
    } catch (error) {
      this.logger.error('Error retrieving jobs', error, { ...query });
      return [];
    }
  }

  async findJobById(id: string): Promise<StoredJob | null> {
    try {
      return await withClient(this.connections, client => this.jobsRepo.findJobById(client, id));
    } catch (error) {
      this.logger.error('Error retrieving job', error, { jobId: id });
      return null;
    }
  }
}
