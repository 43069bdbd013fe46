import { NewJob } from '../types/job';
import { MARKET_SKILLS, RECOMMENDED_SKILLS, matchTerms } from '../etl/skills';
import { roundTo } from '../utils/round';
import { collectSalaries, topCompanies } from './aggregators';

export interface MarketAnalysis {
  keyword: string;
  total_jobs: number;
  analysis_date: string;
  salary_stats: {
    min: number;
    max: number;
    average: number;
    median: number;
  } | null;
  top_skills: { skill: string; count: number }[];
  top_companies: { company: string; jobs: number }[];
  market_summary: string;
}

export interface SkillRecommendation {
  skill: string;
  frequency: number;
  percentage: number;
}

export interface SkillRecommendations {
  target_role: string;
  jobs_analyzed: number;
  recommended_skills: SkillRecommendation[];
  message: string;
}

// Counts every term of the list (zero counts included) in list order
function countTerms(jobs: readonly NewJob[], terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>(terms.map(term => [term, 0]));
  for (const job of jobs) {
    for (const term of matchTerms(`${job.title} ${job.description}`, terms)) {
      counts.set(term, (counts.get(term) ?? 0) + 1);
    }
  }
  return counts;
}

function rankCounts(counts: Map<string, number>): [string, number][] {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

/**
 * Snapshot of the market for one role: salaries, skills and employers
 */
export function analyzeMarket(
  keyword: string,
  jobs: readonly NewJob[],
  now: Date = new Date()
): MarketAnalysis | null {
  if (jobs.length === 0) return null;

  const salaries = collectSalaries(jobs).sort((a, b) => a - b);
  const salaryStats = salaries.length > 0
    ? {
        min: salaries[0],
        max: salaries[salaries.length - 1],
        average: roundTo(salaries.reduce((sum, s) => sum + s, 0) / salaries.length, 2),
        median: salaries[Math.floor(salaries.length / 2)],
      }
    : null;

  const averageText = salaryStats
    ? salaryStats.average.toLocaleString('en-US', { maximumFractionDigits: 2 })
    : 'N/A';

  return {
    keyword,
    total_jobs: jobs.length,
    analysis_date: now.toISOString().slice(0, 10),
    salary_stats: salaryStats,
    top_skills: rankCounts(countTerms(jobs, MARKET_SKILLS))
      .slice(0, 5)
      .map(([skill, count]) => ({ skill, count })),
    top_companies: topCompanies(jobs, 5).top.map(({ key, count }) => ({ company: key, jobs: count })),
    market_summary: `Found ${jobs.length} ${keyword} jobs with average salary $${averageText}`,
  };
}

/**
 * Skills most often asked for in postings matching a target role
 */
export function recommendSkills(
  targetRole: string,
  jobs: readonly NewJob[],
  limit: number
): SkillRecommendations | null {
  if (jobs.length === 0) return null;

  const recommended = rankCounts(countTerms(jobs, RECOMMENDED_SKILLS))
    .slice(0, limit)
    .filter(([, count]) => count > 0)
    .map(([skill, count]) => ({
      skill,
      frequency: count,
      percentage: roundTo((count / jobs.length) * 100, 1),
    }));

  return {
    target_role: targetRole,
    jobs_analyzed: jobs.length,
    recommended_skills: recommended,
    message: `Top ${recommended.length} skills for ${targetRole} roles`,
  };
}
