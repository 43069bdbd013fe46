import { z } from 'zod';
import { NewJob, StoredJob } from '../types/job';
import { Logger } from '../utils/logger';
import { Queryable } from './client';

export interface JobQuery {
  keyword?: string;
  location?: string;
  limit: number;
}

export interface SaveResult {
  attempted: number;
  inserted: number;
  duplicates: number;
  failed: number;
}

const JOB_COLUMNS = [
  'id',
  'title',
  'company',
  'location',
  'salary_min',
  'salary_max',
  'salary_avg',
  'description',
  'skills',
  'skills_count',
  'original_url',
  'created_date',
].join(', ');

const jobRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  salary_min: z.number().int(),
  salary_max: z.number().int(),
  salary_avg: z.number().int(),
  description: z.string(),
  skills: z.array(z.string()),
  skills_count: z.number().int(),
  original_url: z.string(),
  created_date: z.coerce.date(),
});

export function rowToJob(row: unknown): StoredJob {
  const parsed = jobRowSchema.parse(row);
  return {
    ...parsed,
    created_date: parsed.created_date.toISOString(),
  };
}

// ILIKE treats % and _ as wildcards; backslash is the default escape
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

export function buildJobQuery(query: JobQuery): { text: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];

  if (query.keyword) {
    values.push(`%${escapeLike(query.keyword)}%`);
    conditions.push(`(title ILIKE $${values.length} OR description ILIKE $${values.length})`);
  }

  if (query.location) {
    values.push(`%${escapeLike(query.location)}%`);
    conditions.push(`location ILIKE $${values.length}`);
  }

  values.push(query.limit);
  const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

  return {
    text: `SELECT ${JOB_COLUMNS} FROM jobs${where} ORDER BY created_date, id LIMIT $${values.length}`,
    values,
  };
}

/**
 * Database operations for jobs
 * Rows are insert-if-absent: the first write of an id wins
 */
export class JobsRepository {
  constructor(private readonly logger: Logger) {}

  /**
   * Inserts a job unless its id is already stored
   * Returns true if inserted, false if the id existed
   */
  async insertJobIfNotExists(client: Queryable, job: NewJob): Promise<boolean> {
    const result = await client.query(
      `INSERT INTO jobs (
        id, title, company, location, salary_min, salary_max, salary_avg,
        description, skills, skills_count, original_url
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO NOTHING
      RETURNING id`,
      [
        job.id,
        job.title,
        job.company,
        job.location,
        job.salary_min,
        job.salary_max,
        job.salary_avg,
        job.description,
        job.skills,
        job.skills_count,
        job.original_url,
      ]
    );

    return result.rows.length > 0;
  }

  /**
   * Batch insert; a failing row is logged and skipped
   */
  async insertJobsIfNotExists(client: Queryable, jobs: readonly NewJob[]): Promise<SaveResult> {
    const result: SaveResult = { attempted: jobs.length, inserted: 0, duplicates: 0, failed: 0 };

    for (const job of jobs) {
      try {
        if (await this.insertJobIfNotExists(client, job)) {
          result.inserted++;
        } else {
          result.duplicates++;
        }
      } catch (error) {
        result.failed++;
        this.logger.error('Error inserting job', error, { jobId: job.id, title: job.title });
      }
    }

    return result;
  }

  /**
   * Jobs whose title/description contain `keyword` and whose location
   * contains `location`, case-insensitive, in insertion order
   */
  async findJobs(client: Queryable, query: JobQuery): Promise<StoredJob[]> {
    const { text, values } = buildJobQuery(query);
    const result = await client.query(text, values);
    return result.rows.map(rowToJob);
  }

  async findJobById(client: Queryable, id: string): Promise<StoredJob | null> {
    const result = await client.query(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row === undefined ? null : rowToJob(row);
  }
}
