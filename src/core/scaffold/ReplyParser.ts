/**
 * metaprompt-lab - Reply Parser
 * Classifies a conductor reply into one ReplyAction
 */

import { DEFAULT_FINAL_ANSWER_INDICATOR, TRIPLE_QUOTES } from '../../config/constants.js';
import type { CodeBlockAction, ExpertRequest, ReplyAction } from '../../types/index.js';

/** An expert call needs a name line directly followed by a line break */
export const EXPERT_PATTERN = /Expert ((?:[\p{L}\p{M}\p{N}_]+ ?){1,5}):\n/u;

const EXPERT_NAME_PATTERN = /(Expert (?:[\p{L}\p{M}\p{N}_]+ ?){1,5}):?$/u;
const CODE_FENCE_PATTERN = /```([\w+-]*)[^\S\n]*\n([\s\S]*?)```/g;
const RUNNABLE_LANGUAGES = new Set(['', 'python', 'py', 'python3']);

export interface ParseOptions {
  finalAnswerIndicator?: string;
  /** Code blocks are only actionable when they can be executed */
  enableCodeExecution?: boolean;
}

/**
 * Parse a conductor reply. Expert requests come first, so an indicator quoted
 * inside an expert instruction does not end the dialogue. Then the final
 * answer, then a runnable code block; anything else is a `continue`.
 */
export function parseReply(text: string, options: ParseOptions = {}): ReplyAction {
  const indicator = options.finalAnswerIndicator ?? DEFAULT_FINAL_ANSWER_INDICATOR;

  const requests = extractExpertRequests(text);
  if (requests.length > 0) {
    return { kind: 'expert-request', requests, text };
  }

  const answer = extractFinalAnswer(text, indicator);
  if (answer !== null) {
    return { kind: 'final-answer', answer, text };
  }

  if (options.enableCodeExecution) {
    const block = extractCodeBlock(text);
    if (block && RUNNABLE_LANGUAGES.has(block.language ?? '')) {
      return { ...block, text };
    }
  }

  return { kind: 'continue', text };
}

/**
 * Text after the last occurrence of the indicator, trimmed. When that text
 * opens with triple quotes, only the quoted part is returned.
 */
export function extractFinalAnswer(
  text: string,
  indicator: string = DEFAULT_FINAL_ANSWER_INDICATOR,
): string | null {
  const position = text.lastIndexOf(indicator);
  if (position === -1) return null;

  const rest = text.slice(position + indicator.length).trim();
  if (!rest.startsWith(TRIPLE_QUOTES)) {
    return rest;
  }

  const quoted = rest.slice(TRIPLE_QUOTES.length);
  const end = quoted.indexOf(TRIPLE_QUOTES);
  return (end === -1 ? quoted : quoted.slice(0, end)).trim();
}

/**
 * Every closed triple-quoted block whose preceding line names an expert.
 */
export function extractExpertRequests(text: string): ExpertRequest[] {
  if (!EXPERT_PATTERN.test(text)) return [];

  const parts = text.split(TRIPLE_QUOTES);
  const requests: ExpertRequest[] = [];

  // Odd parts sit between quotes; a trailing odd part is an unclosed block.
  for (let i = 1; i < parts.length - 1; i += 2) {
    const preceding = parts[i - 1].trim().split('\n');
    const nameLine = preceding[preceding.length - 1].trim();
    const match = EXPERT_NAME_PATTERN.exec(nameLine);
    if (!match) continue;

    requests.push({
      name: match[1].trim(),
      instruction: parts[i].trim(),
    });
  }

  return requests;
}

/**
 * Last fenced code block in the text
 */
export function extractCodeBlock(text: string): Omit<CodeBlockAction, 'text'> | null {
  let last: RegExpMatchArray | null = null;
  for (const match of text.matchAll(CODE_FENCE_PATTERN)) {
    last = match;
  }
  if (!last) return null;

  const language = last[1].toLowerCase();
  return {
    kind: 'code-block',
    source: last[2].trim(),
    language: language === '' ? null : language,
  };
}
