import skillLists from '../../data/skills.json';

/**
 * Closed vocabulary of skill tags stored on every job
 */
export const SKILL_VOCABULARY: readonly string[] = skillLists.vocabulary;

/**
 * Shorter lists used by the market analysis and skill recommendation reports
 */
export const MARKET_SKILLS: readonly string[] = skillLists.market;
export const RECOMMENDED_SKILLS: readonly string[] = skillLists.recommendations;

/**
 * Returns every term of `vocabulary` contained in `text`, in vocabulary order.
 *
 * Matching is plain substring containment on lower-cased text. There are no
 * word boundaries, so short terms such as "r" or "ai" match inside longer
 * words ("senior", "maintain"). Stored skill tags carry that imprecision.
 */
export function matchTerms(text: string, vocabulary: readonly string[]): string[] {
  const haystack = text.toLowerCase();
  return vocabulary.filter(term => haystack.includes(term));
}

/**
 * Extracts skill tags from a cleaned description and the raw title
 */
export function extractSkills(description: string, title: string): string[] {
  return matchTerms(`${description} ${title}`, SKILL_VOCABULARY);
}
