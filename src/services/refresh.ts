import { JobSearchQuery, JobSource } from '../sources/base';
import { processJobs } from '../etl/pipeline';
import { Logger } from '../utils/logger';
import { JobStore } from './job-store';

export interface RefreshSummary {
  fetched: number;
  cleaned: number;
  /** Records written without error, whether new or already stored */
  saved: number;
  /** Records that were not stored before this refresh */
  inserted: number;
}

/**
 * Fetch, transform and persist one page of upstream postings
 */
export class RefreshService {
  constructor(
    private readonly source: JobSource,
    private readonly store: JobStore,
    private readonly logger: Logger
  ) {}

  async refresh(query: JobSearchQuery): Promise<RefreshSummary> {
    const startTime = Date.now();

    const rawJobs = await this.source.fetchJobs(query);
    const cleanedJobs = processJobs(rawJobs, this.logger);
    const saveResult = await this.store.saveJobs(cleanedJobs);

    const summary: RefreshSummary = {
      fetched: rawJobs.length,
      cleaned: cleanedJobs.length,
      saved: saveResult.attempted - saveResult.failed,
      inserted: saveResult.inserted,
    };

    this.logger.info('Refresh completed', {
      source: this.source.name,
      keyword: query.keyword,
      country: query.country,
      ...summary,
      duration: `${Date.now() - startTime}ms`,
    });

    return summary;
  }
}
