import { z } from 'zod';
import type { AppServices } from '../src/services/container';
import { parseQuery, positiveInt, textWithDefault } from '../src/http/params';
import { Handler } from '../src/http/types';

const refreshQuery = z.object({
  keyword: textWithDefault('data'),
  location: textWithDefault('us'),
  results: positiveInt(50),
});

/**
 * POST /refresh
 * Fetches one page from Adzuna, runs the ETL and stores the result
 */
export function refreshJobs({ refresh }: Pick<AppServices, 'refresh'>): Handler {
  return async (req, res) => {
    const query = parseQuery(refreshQuery, req.query);
    const summary = await refresh.refresh({
      keyword: query.keyword,
      country: query.location,
      resultsPerPage: query.results,
    });

    res.status(200).json({
      message: 'Jobs refreshed with ETL processing',
      ...summary,
    });
  };
}
