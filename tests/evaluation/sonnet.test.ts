/**
 * Sonnet Check Tests
 */

import { describe, it, expect } from 'vitest';
import {
  PronouncingDictionary,
  cleanLine,
  cleanWord,
  parseSonnetTarget,
  rhymingPart,
  schemeErrors,
  slantRhymingParts,
  sonnetErrors,
  splitPoem,
  syllableCount,
  syllableVariations,
} from '../../src/evaluation/sonnet.js';

const dictionary = new PronouncingDictionary({
  the: 'DH AH0',
  'the(2)': 'DH IY0',
  sun: 'S AH1 N',
  and: 'AH0 N D',
  all: 'AO1 L',
  long: 'L AO1 NG',
  bright: 'B R AY1 T',
  day: 'D EY1',
  way: 'W EY1',
  night: 'N AY1 T',
  light: 'L AY1 T',
  stone: 'S T OW1 N',
  bone: 'B OW1 N',
  line: 'L AY1 N',
  fire: 'F AY1 ER0',
  city: 'S IH1 T IY0',
});

const verse = (end: string): string => `the sun and all the long bright sun and ${end}`;
const poem = (...ends: string[]): string => ends.map(verse).join('\n');

describe('cleanLine', () => {
  it('should strip a trailing rhyme label', () => {
    expect(cleanLine('The river runs (A) ')).toBe('The river runs');
  });
});

describe('cleanWord', () => {
  it('should lower-case and strip surrounding punctuation', () => {
    expect(cleanWord('"Night!",')).toBe('night');
    expect(cleanWord("(day's)")).toBe('day\'s');
  });
});

describe('splitPoem', () => {
  it('should drop blank and very short lines', () => {
    expect(splitPoem('First line here\n\n---\nSecond line here (B)')).toEqual(['First line here', 'Second line here']);
  });
});

describe('parseSonnetTarget', () => {
  it('should split scheme and required words', () => {
    expect(parseSonnetTarget('ABAB CDCD EFEF GG, river stone')).toEqual({
      scheme: 'ABAB CDCD EFEF GG',
      requiredWords: ['river', 'stone'],
    });
  });

  it('should accept a scheme alone', () => {
    expect(parseSonnetTarget('ABAB')).toEqual({ scheme: 'ABAB', requiredWords: [] });
  });
});

describe('PronouncingDictionary', () => {
  it('should group alternative pronunciations under one word', () => {
    expect(dictionary.phonesForWord('the')).toEqual(['DH AH0', 'DH IY0']);
    expect(dictionary.has('the(2)')).toBe(false);
    expect(dictionary.phonesForWord('unknown')).toEqual([]);
  });

  it('should find words ending in the same rhyming part', () => {
    expect([...dictionary.rhymes('night')].sort()).toEqual(['bright', 'light']);
    expect([...dictionary.rhymes('day')]).toEqual(['way']);
    expect(dictionary.rhymes('unknown').size).toBe(0);
  });
});

describe('phone helpers', () => {
  it('rhymingPart should start at the last stressed vowel', () => {
    expect(rhymingPart('N AY1 T')).toBe('AY1 T');
    expect(rhymingPart('S IH1 T IY0')).toBe('IH1 T IY0');
    expect(rhymingPart('AE1 T')).toBe('AE1 T');
    expect(rhymingPart('DH AH0')).toBe('DH AH0');
  });

  it('syllableCount should count stressed and unstressed vowels', () => {
    expect(syllableCount('S IH1 T IY0')).toBe(2);
    expect(syllableCount('N AY1 T')).toBe(1);
  });

  it('slantRhymingParts should reduce rhyming parts to consonant skeletons', () => {
    expect(slantRhymingParts('night', dictionary)).toEqual(new Set(['T']));
    expect(slantRhymingParts('fire', dictionary)).toEqual(new Set(['R']));
    expect(slantRhymingParts('city', dictionary)).toEqual(new Set(['T?']));
    expect(slantRhymingParts('day', dictionary)).toEqual(new Set());
  });
});

describe('syllableVariations', () => {
  it('should reach ten for ten one-syllable dictionary words', () => {
    expect(syllableVariations(verse('day'), dictionary).has(10)).toBe(true);
  });

  it('should use the CMU dictionary by default', () => {
    expect(syllableVariations('the day').has(2)).toBe(true);
  });
});

describe('schemeErrors', () => {
  it('should report a line count mismatch', () => {
    expect(schemeErrors('one line only here', 'ABAB', dictionary)).toEqual({
      lineCount: 'Poem has 1 != 4 lines in pattern ABAB',
    });
  });

  it('should accept perfect rhymes', () => {
    expect(schemeErrors(poem('day', 'night', 'way', 'light'), 'ABAB', dictionary)).toEqual({});
  });

  it('should accept slant rhymes', () => {
    expect(schemeErrors(poem('day', 'stone', 'way', 'line'), 'AB AB', dictionary)).toEqual({});
  });

  it('should skip groups with fewer than two dictionary words', () => {
    expect(schemeErrors(poem('day', 'night', 'way', 'zorblat'), 'ABAB', dictionary)).toEqual({});
  });

  it('should tolerate fewer than three suspicious words', () => {
    expect(schemeErrors(poem('day', 'way', 'night', 'bone'), 'ABAB', dictionary)).toEqual({});
  });

  it('should report words that rhyme only outside their group', () => {
    const errors = schemeErrors(poem('day', 'night', 'light', 'way'), 'ABAB', dictionary);

    expect(Object.keys(errors.rhymeErrors ?? {})).toEqual(['day', 'light', 'night', 'way']);
    expect(errors.rhymeErrors?.day).toEqual({
      reason: 'no internal rhymes/slant rhymes, 1 external perfect rhymes',
      internal: { rhymes: [], slantRhymes: [] },
      external: { rhymes: ['way'], slantRhymes: [] },
    });
  });
});

describe('sonnetErrors', () => {
  it('should accept a rhyming poem of ten-syllable lines with the required words', () => {
    expect(sonnetErrors(poem('day', 'night', 'way', 'light'), 'ABAB, sun', dictionary)).toEqual({});
  });

  it('should report line count, missing words and short lines', () => {
    const errors = sonnetErrors('Only one line of verse', 'ABAB, lantern', dictionary);

    expect(errors.lineCount).toBe('Poem has 1 != 4 lines in pattern ABAB');
    expect(errors.missingWords).toEqual(['lantern']);
    expect(errors.syllableErrors?.map(error => error.line)).toEqual(['Only one line of verse']);
    expect(errors.rhymeErrors).toBeUndefined();
  });
});
