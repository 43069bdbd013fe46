import { DisplayField, NewJob, RawJobPosting, SalaryRange } from '../types/job';
import { cleanHtml } from './clean-text';
import { extractSkills } from './skills';

export const UNKNOWN = 'Unknown';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Reads an upstream id. Numeric ids are compared by their string form.
 */
export function readJobId(raw: RawJobPosting): string {
  return asText(raw.id);
}

export function toDisplayField(value: unknown): DisplayField {
  if (typeof value === 'string') {
    return { kind: 'plain', value };
  }
  if (isRecord(value)) {
    const displayName = value.display_name;
    return {
      kind: 'nested',
      displayName: typeof displayName === 'string' ? displayName : undefined,
    };
  }
  return { kind: 'missing' };
}

export function resolveDisplayName(field: DisplayField): string {
  switch (field.kind) {
    case 'plain':
      return field.value;
    case 'nested':
      return field.displayName ?? UNKNOWN;
    case 'missing':
      return UNKNOWN;
  }
}

// Absent, zero, negative or non-numeric all mean "no data"
function toSalary(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.trunc(value);
}

/**
 * Reconciles the salary bounds of a posting.
 * Inverted bounds are swapped; the average is the floored midpoint when both
 * bounds are present, otherwise whichever bound exists, otherwise 0.
 */
export function standardizeSalary(rawMin: unknown, rawMax: unknown): SalaryRange {
  let salaryMin = toSalary(rawMin);
  let salaryMax = toSalary(rawMax);

  if (salaryMin > salaryMax && salaryMax > 0) {
    [salaryMin, salaryMax] = [salaryMax, salaryMin];
  }

  const salaryAvg = salaryMin && salaryMax
    ? Math.floor((salaryMin + salaryMax) / 2)
    : salaryMin || salaryMax;

  return {
    salary_min: salaryMin,
    salary_max: salaryMax,
    salary_avg: salaryAvg,
  };
}

/**
 * Turns one upstream posting into the canonical record
 */
export function normalizeJob(raw: RawJobPosting): NewJob {
  const title = asText(raw.title);
  const description = cleanHtml(asText(raw.description));
  const skills = extractSkills(description, title);

  return {
    id: readJobId(raw),
    title,
    company: resolveDisplayName(toDisplayField(raw.company)),
    location: resolveDisplayName(toDisplayField(raw.location)),
    ...standardizeSalary(raw.salary_min, raw.salary_max),
    description,
    skills,
    skills_count: skills.length,
    original_url: asText(raw.redirect_url),
  };
}
