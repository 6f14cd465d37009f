/**
 * metaprompt-lab - Paths
 * Project-relative locations of prompt and data files
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

const here = path.dirname(fileURLToPath(import.meta.url));
const candidate = path.resolve(here, '..', '..');

/** Repository root, both from sources and from dist/ */
export const ROOT_DIR = path.basename(candidate) === 'dist' ? path.dirname(candidate) : candidate;

export const PROMPTS_DIR = path.join(ROOT_DIR, 'prompts');
export const DATA_DIR = path.join(ROOT_DIR, 'data');

export const DEFAULT_PROMPT_CONFIG_PATH = path.join(PROMPTS_DIR, 'meta-config.json');
export const TASKS_FILE = path.join(PROMPTS_DIR, 'tasks.json');
export const EXPERT_IDENTITY_TEMPLATE_PATH = path.join(PROMPTS_DIR, 'expert-identity-template.txt');

export function datasetPath(task: string): string {
  return path.join(DATA_DIR, `${task}.jsonl`);
}
