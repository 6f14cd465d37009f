/**
 * metaprompt-lab - Sonnet Checks
 *
 * Permissive checks of a poem against a rhyme scheme: line count, rhymes of
 * the line-final words (perfect or slant, from the CMU pronouncing
 * dictionary), 10-11 syllables per line, and required words. A word the
 * dictionary does not know is never reported as a rhyme error.
 */

import { dictionary as cmuDictionary } from 'cmu-pronouncing-dictionary';
import { syllable } from 'syllable';

export const DEFAULT_SONNET_SCHEME = 'ABAB CDCD EFEF GG';
export const ALLOWED_SYLLABLES: ReadonlySet<number> = new Set([10, 11]);
const MIN_LINE_LENGTH = 3;
const SLANT_CONSONANTS = new Set('BCDFGHJKLMNPQRSTVWXYZ'.split(''));

export interface RhymeMatches {
  rhymes: string[];
  slantRhymes: string[];
}

export interface RhymeError {
  reason: string;
  internal: RhymeMatches;
  external: RhymeMatches;
}

export interface SyllableError {
  line: string;
  variations: number[];
}

export interface SonnetErrors {
  lineCount?: string;
  missingWords?: string[];
  syllableErrors?: SyllableError[];
  /** Keyed by line-final word */
  rhymeErrors?: Record<string, RhymeError>;
}

/**
 * Pronunciations keyed by lower-case word, in CMU format: phones separated by
 * spaces, vowels carrying a stress digit. Alternatives use keys like "word(2)".
 */
export class PronouncingDictionary {
  private readonly pronunciations = new Map<string, string[]>();
  private readonly rhymeCache = new Map<string, Set<string>>();

  constructor(entries: Record<string, string>) {
    for (const [key, phones] of Object.entries(entries)) {
      const word = key.replace(/\(\d+\)$/, '');
      const existing = this.pronunciations.get(word);
      if (existing) {
        existing.push(phones);
      } else {
        this.pronunciations.set(word, [phones]);
      }
    }
  }

  has(word: string): boolean {
    return this.pronunciations.has(word);
  }

  phonesForWord(word: string): string[] {
    return this.pronunciations.get(word) ?? [];
  }

  /**
   * Words with a pronunciation ending in the rhyming part of any
   * pronunciation of `word`
   */
  rhymes(word: string): Set<string> {
    const cached = this.rhymeCache.get(word);
    if (cached) return cached;

    const parts = this.phonesForWord(word).map(rhymingPart);
    const found = new Set<string>();
    for (const part of parts) {
      for (const [candidate, pronunciations] of this.pronunciations) {
        if (candidate === word) continue;
        if (pronunciations.some(phones => phones === part || phones.endsWith(` ${part}`))) {
          found.add(candidate);
        }
      }
    }

    this.rhymeCache.set(word, found);
    return found;
  }
}

let defaultDictionary: PronouncingDictionary | null = null;

export function getPronouncingDictionary(): PronouncingDictionary {
  if (!defaultDictionary) {
    defaultDictionary = new PronouncingDictionary(cmuDictionary);
  }
  return defaultDictionary;
}

/**
 * Phones from the last stressed vowel on. The first phone is never taken as
 * the stressed one; without a later stress the whole pronunciation is returned.
 */
export function rhymingPart(phones: string): string {
  const list = phones.split(' ');
  for (let i = list.length - 1; i > 0; i--) {
    if (/[12]$/.test(list[i])) {
      return list.slice(i).join(' ');
    }
  }
  return phones;
}

export function syllableCount(phones: string): number {
  return phones.split(' ').filter(phone => /\d/.test(phone)).length;
}

/**
 * Consonant skeletons of the rhyming parts. R-coloured phones become "R",
 * vowels and other phones "?"; a trailing "?" marks an open ending.
 */
export function slantRhymingParts(word: string, dictionary: PronouncingDictionary): Set<string> {
  const parts = new Set<string>();
  for (const phones of dictionary.phonesForWord(word)) {
    const skeleton = rhymingPart(phones)
      .split(' ')
      .map(phone => (phone.includes('R') ? 'R' : SLANT_CONSONANTS.has(phone) ? phone : '?'))
      .join('');
    if (/^\?*$/.test(skeleton)) continue;
    parts.add(skeleton.replaceAll('?', '') + (skeleton.endsWith('?') ? '?' : ''));
  }
  return parts;
}

export function cleanWord(text: string): string {
  return text.toLowerCase().replace(/^[,.!?;: "'[\]()/]+|[,.!?;: "'[\]()/]+$/g, '');
}

/**
 * Strip a trailing rhyme label such as "(A)"
 */
export function cleanLine(line: string): string {
  return line.replace(/\s*\([A-Za-z]\)\s*$/, '').trim();
}

export function splitPoem(poem: string): string[] {
  return poem
    .split(/\r?\n/)
    .map(cleanLine)
    .filter(line => line.length > MIN_LINE_LENGTH);
}

/**
 * `target` is a rhyme scheme, optionally followed by ", " and the words the
 * poem must contain, e.g. "ABAB CDCD EFEF GG, river stone lantern".
 */
export function parseSonnetTarget(target: string): { scheme: string; requiredWords: string[] } {
  const separator = target.indexOf(', ');
  if (separator === -1) {
    return { scheme: target.trim(), requiredWords: [] };
  }
  return {
    scheme: target.slice(0, separator).trim(),
    requiredWords: target.slice(separator + 2).split(/\s+/).filter(Boolean),
  };
}

/**
 * Possible syllable counts of a word: every dictionary pronunciation plus
 * the spelling-based estimate. Zero is dropped when anything else is known.
 */
export function wordSyllables(word: string, dictionary: PronouncingDictionary): Set<number> {
  if (word === '') return new Set([0]);

  const counts = new Set(dictionary.phonesForWord(word).map(syllableCount));
  counts.add(syllable(word));
  if (counts.size > 1) counts.delete(0);
  return counts;
}

/**
 * Every total a line can reach when each word may take any count between
 * its smallest and largest syllable count
 */
export function syllableVariations(text: string, dictionary: PronouncingDictionary = getPronouncingDictionary()): Set<number> {
  let totals = new Set([0]);
  for (const raw of text.split(/[ -]+/)) {
    const word = cleanWord(raw);
    if (word === '') continue;

    const options = [...wordSyllables(word, dictionary)];
    const min = Math.min(...options);
    const max = Math.max(...options);
    const next = new Set<number>();
    for (const total of totals) {
      for (let count = min; count <= max; count++) {
        next.add(total + count);
      }
    }
    totals = next;
  }
  return totals;
}

/**
 * Rhyme errors of line-final words against the scheme, or a line-count error
 */
export function schemeErrors(
  poem: string,
  scheme: string,
  dictionary: PronouncingDictionary = getPronouncingDictionary(),
): Pick<SonnetErrors, 'lineCount' | 'rhymeErrors'> {
  const lines = splitPoem(poem);
  const pattern = scheme.replace(/\s+/g, '');

  if (lines.length !== pattern.length) {
    return { lineCount: `Poem has ${lines.length} != ${pattern.length} lines in pattern ${pattern}` };
  }

  const lastWords = lines.map(line => cleanWord(line.replaceAll('-', ' ').split(/\s+/).pop() ?? ''));
  const groups = [...new Set(pattern)].sort().map(letter =>
    lastWords.filter((word, i) => pattern[i] === letter && dictionary.has(word)),
  );

  const slantSets = new Map<string, Set<string>>();
  for (const word of groups.flat()) {
    slantSets.set(word, slantRhymingParts(word, dictionary));
  }
  const sharesSlant = (a: string, b: string): boolean => {
    const other = slantSets.get(b) ?? new Set<string>();
    return [...(slantSets.get(a) ?? [])].some(part => other.has(part));
  };

  const scores = new Map<string, { internal: RhymeMatches; external: RhymeMatches }>();
  for (const group of groups) {
    const internalWords = [...new Set(group)];
    if (internalWords.length === 1) continue;
    const externalWords = groups.filter(other => other !== group).flat();

    for (const word of group) {
      const rhymes = dictionary.rhymes(word);
      const compare = (candidates: string[]): RhymeMatches => {
        const matches: RhymeMatches = { rhymes: [], slantRhymes: [] };
        for (const candidate of candidates) {
          if (candidate === word) continue;
          if (rhymes.has(candidate)) {
            matches.rhymes.push(candidate);
          } else if (sharesSlant(candidate, word)) {
            matches.slantRhymes.push(candidate);
          }
        }
        return matches;
      };
      scores.set(word, { internal: compare(internalWords), external: compare(externalWords) });
    }
  }

  const errorReasons = new Map<string, string>();
  const suspiciousReasons = new Map<string, string>();
  for (const [word, { internal, external }] of scores) {
    if (internal.rhymes.length > 0 || internal.slantRhymes.length > 0) {
      continue;
    }
    if (external.rhymes.length >= 2) {
      errorReasons.set(word, 'no internal rhymes, 2+ external perfect rhymes');
    } else if (external.rhymes.length === 1) {
      if (external.slantRhymes.length >= 2) {
        errorReasons.set(word, 'no internal rhymes, 1 external perfect rhyme, 2+ external slant rhymes');
      } else {
        suspiciousReasons.set(word, 'no internal rhymes/slant rhymes, 1 external perfect rhymes');
      }
    } else if (external.slantRhymes.length >= 3) {
      errorReasons.set(word, 'no internal rhymes/slant rhymes, 3+ external slant rhymes');
    }
  }

  // Lone suspicious words are tolerated; three or more count as errors.
  if (errorReasons.size + suspiciousReasons.size >= 3) {
    for (const [word, reason] of suspiciousReasons) {
      errorReasons.set(word, reason);
    }
  }

  if (errorReasons.size === 0) return {};

  const rhymeErrors: Record<string, RhymeError> = {};
  for (const [word, reason] of errorReasons) {
    const score = scores.get(word);
    if (score) rhymeErrors[word] = { reason, ...score };
  }
  return { rhymeErrors };
}

export function sonnetErrors(
  poem: string,
  target: string,
  dictionary: PronouncingDictionary = getPronouncingDictionary(),
): SonnetErrors {
  const { scheme, requiredWords } = parseSonnetTarget(target);
  const errors: SonnetErrors = schemeErrors(poem, scheme, dictionary);

  const lowerPoem = poem.toLowerCase();
  const missing = requiredWords.filter(word => !lowerPoem.includes(word.toLowerCase()));
  if (missing.length > 0) {
    errors.missingWords = missing;
  }

  const syllableErrors: SyllableError[] = [];
  for (const line of splitPoem(poem)) {
    const variations = syllableVariations(line, dictionary);
    if (![...variations].some(count => ALLOWED_SYLLABLES.has(count))) {
      syllableErrors.push({ line, variations: [...variations].sort((a, b) => a - b) });
    }
  }
  if (syllableErrors.length > 0) {
    errors.syllableErrors = syllableErrors;
  }

  return errors;
}
