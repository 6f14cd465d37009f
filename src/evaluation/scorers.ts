/**
 * metaprompt-lab - Task Scorers
 * One comparator per task family, chosen by task-name substring
 */

import { ConfigurationError } from '../core/errors.js';
import { formatExecutionOutput, type CodeRunner } from '../core/execution/CodeExecutor.js';
import { evaluateExpression, expressionNumbers } from './expression.js';
import { normalizeAnswer, removePunctuation } from './normalize.js';
import { DEFAULT_SONNET_SCHEME, sonnetErrors } from './sonnet.js';

export interface ScoreInput {
  input: string;
  answer: string;
  target: string;
}

export interface Scorer {
  name: string;
  /** Task-name substrings this scorer handles */
  matches: string[];
  /** Answers and targets are lower-cased before scoring unless false */
  lowercase: boolean;
  /** Records without a target count as incorrect unless false */
  requiresTarget: boolean;
  score(item: ScoreInput, runner: CodeRunner): Promise<boolean> | boolean;
}

export function cleanGameOf24Answer(answer: string): string {
  let clean = answer;
  if (clean.includes('=')) clean = clean.split('=')[0].trim();
  const is = clean.indexOf(' is ');
  if (is !== -1) clean = clean.slice(is + ' is '.length).trim();
  if (clean.includes('equals')) clean = clean.split('equals')[0].trim();
  if (clean.includes('evaluates to')) clean = clean.split('evaluates to')[0].trim();
  return clean;
}

export function scoreGameOf24(input: string, answer: string): boolean {
  const expression = cleanGameOf24Answer(answer);
  try {
    if (Math.abs(evaluateExpression(expression) - 24) >= 1e-3) {
      return false;
    }
    const used = expressionNumbers(expression).sort();
    const given = input.trim().split(/\s+/).sort();
    return used.length === given.length && used.every((value, i) => value === given[i]);
  } catch {
    return false;
  }
}

export function scoreExactMatch(answer: string, target: string): boolean {
  return normalizeAnswer(answer) === target.trim();
}

export function scoreSoftMatch(answer: string, target: string): boolean {
  return removePunctuation(answer).includes(target);
}

export function scoreMultipleChoice(answer: string, target: string): boolean {
  return answer.startsWith(target);
}

/**
 * The target move must appear before the number of the following move
 */
export function scoreCheckmateInOne(input: string, answer: string, target: string): boolean {
  const parts = input.split('.');
  const moveNumber = parseInt(parts.length >= 2 ? parts[parts.length - 2].trim().split(' ').pop() ?? '' : '', 10);
  if (Number.isNaN(moveNumber)) {
    return answer.includes(target);
  }

  const nextMove = String(moveNumber + 1);
  const candidate = answer.includes(nextMove) ? answer.split(nextMove)[0].trim() : answer;
  return candidate.includes(target);
}

/**
 * Program that prints sat(solution()) for a programming puzzle answer
 */
export function buildPuzzleProgram(input: string, answer: string): string {
  let output = answer;
  if (output.includes('```python')) {
    output = output.split('```python').pop()?.trim() ?? '';
    output = output.split('```')[0].trim();
  }

  let code: string;
  if (output.includes('def sat')) {
    if (!output.includes('from typing')) {
      output = `from typing import *\n${output}`;
    }
    code = `${output}\nanswer = solution()\nprint(sat(answer))`;
  } else {
    code = `from typing import *\n${input}\n${output}\nanswer = solution()\nprint(sat(answer))`;
  }
  return code.replaceAll('List[', 'list[');
}

export async function scoreProgrammingPuzzle(input: string, answer: string, runner: CodeRunner): Promise<boolean> {
  const result = await runner.execute(buildPuzzleProgram(input, answer));
  return formatExecutionOutput(result).includes('True');
}

export const SCORERS: Scorer[] = [
  {
    name: 'game-of-24',
    matches: ['GameOf24'],
    lowercase: true,
    requiresTarget: false,
    score: ({ input, answer }) => scoreGameOf24(input, answer),
  },
  {
    name: 'exact-match',
    matches: ['word_sorting', 'multistep_arithmetic_two'],
    lowercase: true,
    requiresTarget: true,
    score: ({ answer, target }) => scoreExactMatch(answer, target),
  },
  {
    name: 'checkmate-in-one',
    matches: ['CheckmateInOne'],
    lowercase: true,
    requiresTarget: true,
    score: ({ input, answer, target }) => scoreCheckmateInOne(input, answer, target),
  },
  {
    name: 'sonnet',
    matches: ['Sonnets'],
    lowercase: true,
    requiresTarget: false,
    score: ({ answer, target }) => {
      const errors = sonnetErrors(answer, target.trim() === '' ? DEFAULT_SONNET_SCHEME : target);
      return Object.keys(errors).length === 0;
    },
  },
  {
    name: 'multiple-choice',
    matches: ['geometric_shapes', 'ruin_names'],
    lowercase: true,
    requiresTarget: true,
    score: ({ answer, target }) => scoreMultipleChoice(answer, target),
  },
  {
    name: 'soft-match',
    matches: ['MGSM'],
    lowercase: true,
    requiresTarget: true,
    score: ({ answer, target }) => scoreSoftMatch(answer, target),
  },
  {
    name: 'programming-puzzle',
    matches: ['P3'],
    lowercase: false,
    requiresTarget: false,
    score: ({ input, answer }, runner) => scoreProgrammingPuzzle(input, answer, runner),
  },
];

export function getScorer(task: string): Scorer {
  const scorer = SCORERS.find(candidate => candidate.matches.some(match => task.includes(match)));
  if (!scorer) {
    throw new ConfigurationError(`No scorer for task ${task}`, { context: { task } });
  }
  return scorer;
}
