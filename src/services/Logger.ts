/**
 * metaprompt-lab - Logger Service
 * Centralized logging with chalk styling and headless mode support
 */

import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';
import { truncate } from '../utils/strings.js';
import { LOG_PREVIEW_LENGTH } from '../config/constants.js';

export interface LoggerOptions {
  level?: LogLevel;
  headless?: boolean;
  verbose?: boolean;
}

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'info';
  private headless: boolean = false;
  private verbose: boolean = false;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = new Logger();
    }
    return this.instance;
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.headless !== undefined) this.headless = options.headless;
    if (options.verbose !== undefined) this.verbose = options.verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.headless && level !== 'error') return false;
    if (this.level === 'silent') return false;

    const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
    return levels.indexOf(level) >= levels.indexOf(this.level);
  }

  // Scaffold tracing (verbose only)
  round(round: number, maxRounds: number): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    console.log(chalk.yellow(`\n[Round ${round}/${maxRounds}]`));
  }

  conductor(reply: string): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    console.log(chalk.cyan(`[Conductor] ${truncate(reply, LOG_PREVIEW_LENGTH)}`));
  }

  expert(name: string, chars: number, durationMs?: number): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    const duration = durationMs ? ` in ${(durationMs / 1000).toFixed(1)}s` : '';
    console.log(chalk.magenta(`[${name}] Done (${chars} chars${duration})`));
  }

  tool(summary: string): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    console.log(chalk.gray(`[Code] ${truncate(summary, LOG_PREVIEW_LENGTH)}`));
  }

  // Example logging
  example(index: number, input: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan(`\n[Example #${index}] ${truncate(input, LOG_PREVIEW_LENGTH)}`));
  }

  exampleComplete(index: number, answer: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`[Example #${index}] Answer: ${truncate(answer, LOG_PREVIEW_LENGTH)}`));
  }

  exampleFailed(index: number, error: string): void {
    if (!this.shouldLog('error')) return;
    console.log(chalk.red(`[Example #${index}] Failed: ${error}`));
  }

  // General logging
  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.white(message));
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(message));
  }

  error(message: string): void {
    console.log(chalk.red(message));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(chalk.yellow(message));
  }

  banner(title: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('\n' + '='.repeat(50)));
    console.log(chalk.cyan(`  ${title}`));
    console.log(chalk.cyan('='.repeat(50)));
  }

  separator(): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('-'.repeat(50)));
  }

  duration(seconds: number): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`\nFinished in ${seconds}s\n`));
  }
}

export const logger = Logger.getInstance();
