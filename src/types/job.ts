/**
 * Raw job posting as returned by the upstream search API (Adzuna).
 * Fields are loosely typed; nothing is trusted until normalization.
 */
export interface RawJobPosting {
  id?: unknown;
  title?: unknown;
  company?: unknown;
  location?: unknown;
  description?: unknown;
  salary_min?: unknown;
  salary_max?: unknown;
  redirect_url?: unknown;
  [key: string]: unknown;
}

/**
 * Company / location field as it arrives upstream: either a plain string
 * or an object carrying a display name. Resolved once during normalization.
 */
export type DisplayField =
  | { kind: 'plain'; value: string }
  | { kind: 'nested'; displayName: string | undefined }
  | { kind: 'missing' };

/**
 * Normalized job schema
 * Everything the pipeline produces and the store persists
 */
export interface NewJob {
  id: string;
  title: string;
  company: string;
  location: string;
  salary_min: number;
  salary_max: number;
  salary_avg: number;
  description: string;
  skills: string[];
  skills_count: number;
  original_url: string;
}

/**
 * Job as read back from the store
 */
export interface StoredJob extends NewJob {
  created_date: string;
}

export interface SalaryRange {
  salary_min: number;
  salary_max: number;
  salary_avg: number;
}
