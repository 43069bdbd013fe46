import fetch from 'node-fetch';
import { JobSearchQuery, JobSource } from './base';
import { RawJobPosting } from '../types/job';
import { Logger } from '../utils/logger';

export interface AdzunaCredentials {
  appId: string;
  apiKey: string;
  baseUrl: string;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchFn = (url: string) => Promise<FetchResponse>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Adzuna search API adapter
 * API Documentation: https://developer.adzuna.com/
 */
export class AdzunaSource implements JobSource {
  readonly name = 'adzuna';

  constructor(
    private readonly credentials: AdzunaCredentials,
    private readonly logger: Logger,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  buildUrl(query: JobSearchQuery): string {
    const page = query.page ?? 1;
    const params = new URLSearchParams({
      app_id: this.credentials.appId,
      app_key: this.credentials.apiKey,
      what: query.keyword,
      results_per_page: String(query.resultsPerPage),
    });
    const base = this.credentials.baseUrl.replace(/\/+$/, '');
    return `${base}/${encodeURIComponent(query.country)}/search/${page}?${params.toString()}`;
  }

  async fetchJobs(query: JobSearchQuery): Promise<RawJobPosting[]> {
    if (!this.credentials.appId || !this.credentials.apiKey) {
      this.logger.warn('Adzuna credentials are not configured, skipping fetch');
      return [];
    }

    try {
      this.logger.info(`Fetching jobs from ${this.name}`, {
        keyword: query.keyword,
        country: query.country,
        resultsPerPage: query.resultsPerPage,
      });

      const response = await this.fetchFn(this.buildUrl(query));
      if (!response.ok) {
        this.logger.warn(`Adzuna API returned ${response.status}`, { keyword: query.keyword });
        return [];
      }

      const data = await response.json();
      const results = isRecord(data) ? data.results : undefined;
      if (!Array.isArray(results)) {
        this.logger.warn('Adzuna API response has no results array');
        return [];
      }

      const jobs = results.filter(isRecord);
      this.logger.info(`Fetched ${jobs.length} jobs from ${this.name}`, {
        totalItems: results.length,
      });
      return jobs;
    } catch (error) {
      this.logger.error(`Error fetching jobs from ${this.name}`, error);
      return [];
    }
  }
}
