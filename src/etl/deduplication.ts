import { RawJobPosting } from '../types/job';
import { readJobId } from './normalize';

/**
 * Keeps the first posting seen for every id.
 * Postings without an id are dropped; survivors keep their relative order.
 */
export function removeDuplicates<T extends RawJobPosting>(jobs: readonly T[]): T[] {
  const seenIds = new Set<string>();
  const uniqueJobs: T[] = [];

  for (const job of jobs) {
    const id = readJobId(job);
    if (!id || seenIds.has(id)) continue;

    seenIds.add(id);
    uniqueJobs.push(job);
  }

  return uniqueJobs;
}
