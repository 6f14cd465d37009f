/**
 * CLI Commands - run, evaluate and tasks
 *
 * @module bin/commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfig } from '../src/config/config.js';
import { DEFAULT_PROMPT_CONFIG_PATH, datasetPath } from '../src/config/paths.js';
import { listStrategies } from '../src/config/strategies.js';
import { loadTaskCatalogue } from '../src/config/tasks.js';
import {
  DEFAULT_CODE_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_EXPERT_PYTHON_MESSAGE,
  DEFAULT_INTERMEDIATE_FEEDBACK,
  DEFAULT_MAX_EXAMPLES,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_MAX_TRANSCRIPT_TOKENS,
} from '../src/config/constants.js';
import { CodeExecutor } from '../src/core/execution/CodeExecutor.js';
import { ExperimentRunner } from '../src/harness/ExperimentRunner.js';
import { resolveStrategy } from '../src/harness/prompts.js';
import { evaluateRuns } from '../src/evaluation/Evaluator.js';
import { logger } from '../src/services/Logger.js';
import type { ProviderType, ScaffoldOptions } from '../src/types/index.js';
import {
  createLanguageModel,
  exitWithError,
  parseInteger,
  parseNumber,
  parsePositiveInteger,
  parseProvider,
  printBanner,
} from './cli-config.js';

interface RunFlags {
  task: string;
  strategy: string;
  config: string;
  input?: string;
  outputDir?: string;
  provider?: ProviderType;
  model?: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  maxNum: number;
  maxRounds: number;
  maxTranscriptTokens: number;
  concurrency: number;
  codeTimeout?: number;
  questionPrefix?: string;
  questionSuffix?: string;
  includeExpertName?: boolean;
  freshEyes?: boolean;
  codeExecution?: boolean;
  extractOutput?: boolean;
  zeroShotCotExperts?: boolean;
  verbose?: boolean;
}

interface EvaluateFlags {
  directory: string;
  task: string;
  json?: boolean;
}

// ============================================================================
// REGISTER ALL SUBCOMMANDS
// ============================================================================

export function registerCommands(program: Command): void {
  // ── RUN ──
  program
    .command('run')
    .description('Run a prompting strategy over a task dataset')
    .option('-t, --task <name>', 'Task name (see "tasks")', 'GameOf24')
    .option('-s, --strategy <name>', 'Prompting strategy (see "tasks")', 'meta')
    .option('-c, --config <path>', 'Role configuration file', DEFAULT_PROMPT_CONFIG_PATH)
    .option('-i, --input <path>', 'Dataset file (default: data/<task>.jsonl)')
    .option('-o, --output-dir <dir>', 'Directory for run outputs')
    .option('--provider <type>', 'Model provider: gemini or openai', parseProvider)
    .option('-m, --model <name>', 'Model name')
    .option('--temperature <value>', 'Sampling temperature for conductor and experts', parseNumber)
    .option('--top-p <value>', 'Nucleus sampling for conductor and experts', parseNumber)
    .option('--max-tokens <n>', 'Max tokens per completion', parsePositiveInteger)
    .option('-n, --max-num <n>', 'Maximum number of examples', parseInteger, DEFAULT_MAX_EXAMPLES)
    .option('--max-rounds <n>', 'Conductor rounds per example', parsePositiveInteger, DEFAULT_MAX_ROUNDS)
    .option('--max-transcript-tokens <n>', 'Estimated token budget per dialogue', parsePositiveInteger, DEFAULT_MAX_TRANSCRIPT_TOKENS)
    .option('--concurrency <n>', 'Examples processed in parallel', parsePositiveInteger, DEFAULT_CONCURRENCY)
    .option('--code-timeout <ms>', `Wall-clock limit for executed code (default: METAPROMPT_CODE_TIMEOUT_MS or ${DEFAULT_CODE_TIMEOUT_MS})`, parsePositiveInteger)
    .option('--question-prefix <text>', 'Question prefix text or .txt path')
    .option('--question-suffix <text>', 'Question suffix text or .txt path')
    .option('--include-expert-name', 'Start expert instructions with "You are Expert <Name>."')
    .option('--fresh-eyes', 'Experts see only their own instruction')
    .option('--code-execution', 'Execute Python code from replies (default for "meta")')
    .option('--no-code-execution', 'Never execute code')
    .option('--extract-output', 'Keep expert text after "* * *" and reject long replies')
    .option('--zero-shot-cot-experts', 'Append "Let\'s think step by step." to expert instructions')
    .option('-v, --verbose', 'Trace rounds, experts and code runs')
    .action(async (flags: RunFlags) => {
      try {
        const config = getConfig();
        logger.configure({ level: config.logLevel, verbose: Boolean(flags.verbose) });
        printBanner();

        const strategy = await resolveStrategy(flags.strategy, {
          questionPrefix: flags.questionPrefix,
          questionSuffix: flags.questionSuffix,
        });
        const model = createLanguageModel({ provider: flags.provider, model: flags.model });
        const codeTimeoutMs = flags.codeTimeout ?? config.execution.codeTimeoutMs;

        const scaffold: ScaffoldOptions = {
          maxRounds: flags.maxRounds,
          maxTranscriptTokens: flags.maxTranscriptTokens,
          freshEyes: Boolean(flags.freshEyes),
          enableCodeExecution: flags.codeExecution ?? strategy.name === 'meta',
          includeExpertName: Boolean(flags.includeExpertName),
          extractExpertOutput: Boolean(flags.extractOutput),
          zeroShotCotInExperts: Boolean(flags.zeroShotCotExperts),
          expertPythonMessage: DEFAULT_EXPERT_PYTHON_MESSAGE,
          intermediateFeedback: DEFAULT_INTERMEDIATE_FEEDBACK,
          codeTimeoutMs,
        };

        logger.info(chalk.gray(`Task: ${flags.task} | Strategy: ${strategy.name} | Model: ${model.modelName}`));

        const runner = new ExperimentRunner({
          model,
          codeRunner: new CodeExecutor({
            interpreter: config.execution.pythonInterpreter,
            timeoutMs: codeTimeoutMs,
          }),
        });

        const spinner = flags.verbose ? null : ora({ text: chalk.gray('Loading task...') }).start();
        const startTime = Date.now();

        const summary = await runner
          .run({
            task: flags.task,
            strategy,
            configPath: flags.config,
            inputPath: flags.input ?? datasetPath(flags.task),
            outputDirectory: flags.outputDir ?? config.all.outputDirectory,
            maxExamples: flags.maxNum,
            concurrency: flags.concurrency,
            scaffold,
            parameterOverrides: {
              temperature: flags.temperature,
              topP: flags.topP,
              maxTokens: flags.maxTokens,
            },
            onProgress: (done, total) => {
              if (spinner) spinner.text = chalk.gray(`[${done}/${total}] examples processed`);
            },
          })
          .catch((error: unknown) => {
            spinner?.fail(chalk.red('Run aborted'));
            throw error;
          });

        const usage = model.getUsage();
        const message = `${summary.completed} completed, ${summary.failed} failed, ${summary.skipped} skipped → ${summary.outputDirectory}`;
        if (spinner) {
          if (summary.failed > 0) spinner.warn(chalk.yellow(message));
          else spinner.succeed(chalk.green(message));
        } else {
          logger.success(message);
        }
        logger.info(chalk.gray(`${usage.calls} model calls, ${usage.totalTokens} tokens`));
        logger.duration(Math.round((Date.now() - startTime) / 100) / 10);
      } catch (error: unknown) {
        exitWithError(error);
      }
    });

  // ── EVALUATE ──
  program
    .command('evaluate')
    .description('Score run outputs against their targets')
    .option('-d, --directory <glob>', 'Glob of run directories', 'outputs/*')
    .option('-t, --task <name>', 'Task name', 'GameOf24')
    .option('--json', 'Print the reports as JSON')
    .action(async (flags: EvaluateFlags) => {
      try {
        const config = getConfig();
        logger.configure({ level: config.logLevel });

        const spinner = flags.json ? null : ora({ text: chalk.gray('Evaluating...') }).start();
        const reports = await evaluateRuns({
          directory: flags.directory,
          task: flags.task,
          codeRunner: new CodeExecutor({
            interpreter: config.execution.pythonInterpreter,
            timeoutMs: config.execution.codeTimeoutMs,
          }),
        });
        spinner?.stop();

        if (flags.json) {
          console.log(JSON.stringify(reports, null, 2));
          return;
        }

        if (reports.length === 0) {
          logger.warn(`No run directories for ${flags.task} match ${flags.directory}`);
          return;
        }

        for (const report of reports) {
          console.log(`${chalk.cyan(report.directory)}: ${report.accuracy.toFixed(4)} (${report.correct}/${report.total})`);
        }
      } catch (error: unknown) {
        exitWithError(error);
      }
    });

  // ── TASKS ──
  program
    .command('tasks')
    .description('List tasks and strategies')
    .action(async () => {
      try {
        const catalogue = await loadTaskCatalogue();

        console.log(chalk.cyan('\nTasks:'));
        for (const task of Object.keys(catalogue)) {
          console.log(`  ${task}`);
        }

        console.log(chalk.cyan('\nStrategies:'));
        for (const preset of listStrategies()) {
          console.log(`  ${preset.name.padEnd(16)} ${chalk.gray(`[${preset.mode}]`)} ${preset.description}`);
        }
        console.log('');
      } catch (error: unknown) {
        exitWithError(error);
      }
    });
}
