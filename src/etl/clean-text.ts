const TAG_PATTERN = /<[^>]+>/g;
const WHITESPACE_PATTERN = /\s+/g;
// Anything that is not a letter, digit, underscore, whitespace or .,!?-
const DISALLOWED_PATTERN = /[^\p{L}\p{N}_\s.,!?-]/gu;

/**
 * Removes markup from a job description and reduces it to plain text.
 * Entities are not decoded: "&amp;" ends up as "amp".
 */
export function cleanHtml(text: string | null | undefined): string {
  if (!text) return '';

  return text
    .replace(TAG_PATTERN, '')
    .replace(WHITESPACE_PATTERN, ' ')
    .replace(DISALLOWED_PATTERN, '')
    .trim();
}
