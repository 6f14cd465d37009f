/**
 * metaprompt-lab - Code Executor
 *
 * Runs model-written code in a child process:
 * - source written to a fresh temp directory, removed afterwards
 * - spawn() with array arguments, never a shell
 * - wall-clock timeout enforced with SIGKILL
 *
 * Isolation is the process boundary only.
 */

import { spawn } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { CodeExecutionError, getErrorMessage } from '../errors.js';
import {
  CODE_NO_OUTPUT_MESSAGE,
  CODE_TIMEOUT_MESSAGE,
  DEFAULT_CODE_TIMEOUT_MS,
  DEFAULT_PYTHON_INTERPRETER,
} from '../../config/constants.js';

export interface CodeExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
}

export interface CodeExecutorOptions {
  /** Interpreter command, resolved through PATH */
  interpreter?: string;
  timeoutMs?: number;
  /** File extension of the temp source file */
  extension?: string;
}

/**
 * Anything that can run a code snippet and report its output
 */
export interface CodeRunner {
  execute(source: string, timeoutMs?: number): Promise<CodeExecutionResult>;
}

export class CodeExecutor implements CodeRunner {
  private interpreter: string;
  private timeoutMs: number;
  private extension: string;

  constructor(options: CodeExecutorOptions = {}) {
    this.interpreter = options.interpreter ?? DEFAULT_PYTHON_INTERPRETER;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CODE_TIMEOUT_MS;
    this.extension = options.extension ?? '.py';
  }

  async execute(source: string, timeoutMs: number = this.timeoutMs): Promise<CodeExecutionResult> {
    let dir: string;
    try {
      dir = await mkdtemp(path.join(tmpdir(), 'metaprompt-'));
    } catch (error: unknown) {
      throw new CodeExecutionError(`Cannot create temp directory: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const file = path.join(dir, `snippet${this.extension}`);
    try {
      await writeFile(file, source, 'utf-8');
      return await this.spawnInterpreter(file, timeoutMs);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private spawnInterpreter(file: string, timeoutMs: number): Promise<CodeExecutionResult> {
    const startTime = Date.now();

    return new Promise(resolve => {
      const proc = spawn(this.interpreter, [file], {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: string[] = [];
      const stderr: string[] = [];
      let timedOut = false;
      let settled = false;

      const finish = (exitCode: number | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve({
          stdout: stdout.join(''),
          stderr: stderr.join(''),
          exitCode,
          timedOut,
          durationMs: Date.now() - startTime,
        });
      };

      const timeoutId = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, timeoutMs);

      // Chunks may split multi-byte characters; decode on the stream
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      proc.stdout.on('data', (data: string) => {
        stdout.push(data);
      });

      proc.stderr.on('data', (data: string) => {
        stderr.push(data);
      });

      proc.on('error', (error) => {
        stderr.push(error.message);
        finish(null);
      });

      proc.on('close', (code) => {
        finish(code);
      });
    });
  }
}

/**
 * Observation text fed back into a dialogue
 */
export function formatExecutionOutput(result: CodeExecutionResult): string {
  if (result.timedOut) {
    return CODE_TIMEOUT_MESSAGE;
  }

  const output = result.stdout.trim();
  if (output !== '') {
    return output;
  }

  const errors = result.stderr.trim();
  if (errors !== '') {
    return `Error in execution: ${errors}`;
  }

  return CODE_NO_OUTPUT_MESSAGE;
}
