/**
 * metaprompt-lab - Strategy Presets
 */

import { DEFAULT_QUESTION_SUFFIX } from './constants.js';
import type { StrategyMode, StrategyName } from '../types/index.js';

export interface StrategyPreset {
  name: StrategyName;
  description: string;
  mode: StrategyMode;
  /** Literal text, or a .txt file under prompts/ */
  questionPrefix: string;
  /** Literal text, or a .txt file under prompts/ */
  questionSuffix: string;
  expertPrompting: boolean;
}

export const STRATEGY_PRESETS: Record<StrategyName, StrategyPreset> = {
  meta: {
    name: 'meta',
    description: 'Meta-prompting with the Python expert',
    mode: 'scaffold',
    questionPrefix: 'meta-prompting-instruction.txt',
    questionSuffix: DEFAULT_QUESTION_SUFFIX,
    expertPrompting: false,
  },
  'meta-no-python': {
    name: 'meta-no-python',
    description: 'Meta-prompting without the Python expert',
    mode: 'scaffold',
    questionPrefix: 'meta-prompting-no-python-instruction.txt',
    questionSuffix: DEFAULT_QUESTION_SUFFIX,
    expertPrompting: false,
  },
  multipersona: {
    name: 'multipersona',
    description: 'Multi-persona self-collaboration in one call',
    mode: 'single',
    questionPrefix: 'multipersona-prompting.txt',
    questionSuffix: '',
    expertPrompting: false,
  },
  'zero-shot-cot': {
    name: 'zero-shot-cot',
    description: "Zero-shot chain of thought (\"Let's think step by step.\")",
    mode: 'single',
    questionPrefix: '',
    questionSuffix: 'zero-shot-cot-suffix.txt',
    expertPrompting: false,
  },
  'static-expert': {
    name: 'static-expert',
    description: 'Fixed generic expert instruction',
    mode: 'single',
    questionPrefix: 'expert-generic-instruction.txt',
    questionSuffix: '',
    expertPrompting: false,
  },
  'dynamic-expert': {
    name: 'dynamic-expert',
    description: 'Generated expert identity, then one answering call',
    mode: 'single',
    questionPrefix: '',
    questionSuffix: '',
    expertPrompting: true,
  },
  standard: {
    name: 'standard',
    description: 'Plain zero-shot question',
    mode: 'single',
    questionPrefix: '',
    questionSuffix: '',
    expertPrompting: false,
  },
};

export function isStrategyName(value: string): value is StrategyName {
  return Object.keys(STRATEGY_PRESETS).includes(value);
}

export function listStrategies(): StrategyPreset[] {
  return Object.values(STRATEGY_PRESETS);
}
