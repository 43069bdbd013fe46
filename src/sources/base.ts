import { RawJobPosting } from '../types/job';

export interface JobSearchQuery {
  keyword: string;
  /** Country code of the search index, e.g. "us" or "gb" */
  country: string;
  resultsPerPage: number;
  page?: number;
}

/**
 * Base interface for upstream job sources
 */
export interface JobSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches one page of postings matching the query.
   * Never rejects: a failed fetch is logged and yields an empty page.
   */
  fetchJobs(query: JobSearchQuery): Promise<RawJobPosting[]>;
}
