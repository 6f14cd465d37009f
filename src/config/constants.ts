/**
 * metaprompt-lab - Constants
 * Centralized configuration values
 */

// Display truncation lengths
export const LOG_PREVIEW_LENGTH = 120;
export const INPUT_DISPLAY_TRUNCATION = 60;

// Scaffold limits
export const DEFAULT_MAX_ROUNDS = 16;
export const DEFAULT_MAX_TRANSCRIPT_TOKENS = 60000;
export const CHARS_PER_TOKEN = 4;

// Code execution
export const DEFAULT_CODE_TIMEOUT_MS = 3000;
export const DEFAULT_PYTHON_INTERPRETER = 'python3';

// Retry policy for model calls
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;

// Harness
export const DEFAULT_MAX_EXAMPLES = 9999;
export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_OUTPUT_DIRECTORY = 'outputs';
export const RUN_MANIFEST_FILE = 'run.json';

// Models
export const DEFAULT_MODELS = {
  gemini: 'gemini-1.5-flash',
  openai: 'gpt-3.5-turbo',
} as const;

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com';

// Dialogue markers
export const TRIPLE_QUOTES = '"""';
export const DEFAULT_FINAL_ANSWER_INDICATOR = '>> FINAL ANSWER:';
export const PYTHON_EXPERT_NAME = 'Expert Python';
export const RUN_CODE_MARKER = 'Please run this code!';
export const EXPERT_OUTPUT_SEPARATOR = '* * *';
export const MAX_EXPERT_OUTPUT_WORDS = 128;
export const SOLUTION_TOO_LONG = 'Solution too long. Please try again.';
export const LAST_ROUND_NOTICE = 'This is the last round; so, please present your final answer.';
export const ZERO_SHOT_COT_TRIGGER = "Let's think step by step.";

export const DEFAULT_QUESTION_SUFFIX =
  '\n\nLet\'s first come up with a list of experts you may want to consult for this problem and then immediately start solving it.';

export const DEFAULT_INTERMEDIATE_FEEDBACK =
  'Based on the information given, what are the most logical next steps or conclusions? ' +
  'Please make sure that the solution is accurate, directly answers the original question, and follows all given constraints. ' +
  'Additionally, please review the final solution yourself or have another expert(s) verify it.';

export const DEFAULT_EXPERT_PYTHON_MESSAGE =
  'You are an expert in Python and can generate Python code. ' +
  'To execute the code and display its output in the terminal using print statements, ' +
  `please make sure to include "${RUN_CODE_MARKER}" after the code block (i.e., after the closing code blocks)`;

// Code execution observations
export const CODE_TIMEOUT_MESSAGE = 'Execution took too long, aborting...';
export const CODE_NO_OUTPUT_MESSAGE =
  '(No output was generated. It is possible that you did not include a print statement in your code.)';
