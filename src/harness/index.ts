/**
 * metaprompt-lab - Harness Module Exports
 */

export { ExperimentRunner, type ExperimentOptions, type ExperimentRunnerDependencies } from './ExperimentRunner.js';
export { loadDataset, parseExampleLine, type Dataset } from './dataset.js';
export { buildQuestion, resolvePromptFragment, resolveStrategy, type StrategyOverrides } from './prompts.js';
export * from './outputs.js';
