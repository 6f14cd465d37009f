/**
 * metaprompt-lab - Answer Normalization
 */

const PUNCTUATION = /[,;:."]/g;

export function removePunctuation(text: string): string {
  return text.replace(PUNCTUATION, '');
}

/**
 * Lower-case, drop `, ; : . "`, turn newlines into spaces and trim.
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeAnswer(text: string): string {
  return removePunctuation(text.toLowerCase()).replace(/\r?\n/g, ' ').trim();
}
