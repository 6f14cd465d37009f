/**
 * metaprompt-lab - String Utilities
 * Common string manipulation functions
 */

import { CHARS_PER_TOKEN, INPUT_DISPLAY_TRUNCATION } from '../config/constants.js';

/**
 * Truncate string with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Truncate a dataset input for progress display
 */
export function truncateInput(input: string): string {
  return truncate(input.replace(/\s+/g, ' ').trim(), INPUT_DISPLAY_TRUNCATION);
}

/**
 * Rough token estimate: ~4 characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
