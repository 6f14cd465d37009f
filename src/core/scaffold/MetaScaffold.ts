/**
 * metaprompt-lab - Meta-Prompting Scaffold
 *
 * Drives one bounded conductor/expert dialogue:
 *   ROUND n → conductor reply → parse → experts | code | nudge → next round
 * until a final answer, the round limit or the transcript token budget.
 */

import { CodeExecutionError } from '../errors.js';
import { CodeExecutor, formatExecutionOutput, type CodeRunner } from '../execution/CodeExecutor.js';
import type { LanguageModel } from '../LanguageModel.js';
import { extractCodeBlock, parseReply } from './ReplyParser.js';
import { logger } from '../../services/Logger.js';
import { estimateTokens, countWords } from '../../utils/strings.js';
import {
  EXPERT_OUTPUT_SEPARATOR,
  LAST_ROUND_NOTICE,
  MAX_EXPERT_OUTPUT_WORDS,
  PYTHON_EXPERT_NAME,
  RUN_CODE_MARKER,
  SOLUTION_TOO_LONG,
  TRIPLE_QUOTES,
  ZERO_SHOT_COT_TRIGGER,
} from '../../config/constants.js';
import type {
  ChatMessage,
  ExpertRequest,
  PromptConfig,
  ScaffoldOptions,
  ScaffoldResult,
  TerminationReason,
  TranscriptEntry,
} from '../../types/index.js';

export interface MetaScaffoldDependencies {
  model: LanguageModel;
  promptConfig: PromptConfig;
  options: ScaffoldOptions;
  /** Defaults to a CodeExecutor using `options.codeTimeoutMs` */
  codeRunner?: CodeRunner;
}

export class MetaScaffold {
  private model: LanguageModel;
  private config: PromptConfig;
  private options: ScaffoldOptions;
  private codeRunner: CodeRunner;

  constructor(deps: MetaScaffoldDependencies) {
    this.model = deps.model;
    this.config = deps.promptConfig;
    this.options = deps.options;
    this.codeRunner = deps.codeRunner ?? new CodeExecutor({ timeoutMs: deps.options.codeTimeoutMs });
  }

  /**
   * Run the dialogue for one question. `prefixMessages` replaces the
   * conductor prefix from the prompt configuration when given.
   */
  async run(question: string, prefixMessages: ChatMessage[] = this.config.conductor.messages): Promise<ScaffoldResult> {
    const { maxRounds, maxTranscriptTokens } = this.options;
    const conductor = this.config.conductor;
    const noticeRound = Math.max(1, maxRounds - 1);

    const transcript: TranscriptEntry[] = [
      ...prefixMessages.map((message): TranscriptEntry => ({ ...message, kind: 'instruction', round: 0 })),
      { role: 'user', content: question, kind: 'instruction', round: 0 },
    ];

    let lastReply = '';

    for (let round = 1; round <= maxRounds; round++) {
      const pending = transcript[transcript.length - 1];
      let content = `ROUND ${round}:\n\n${pending.content}`;
      if (round === noticeRound) {
        content += `\n\n${LAST_ROUND_NOTICE}`;
      }
      transcript[transcript.length - 1] = { ...pending, content };

      logger.round(round, maxRounds);

      const [reply = ''] = await this.model.generate(toChatMessages(transcript), {
        ...conductor.parameters,
        numReturnSequences: 1,
      });
      transcript.push({ role: 'assistant', content: reply, kind: 'conductor', round });
      lastReply = reply;
      logger.conductor(reply);

      const action = parseReply(reply, {
        finalAnswerIndicator: conductor.finalAnswerIndicator,
        enableCodeExecution: this.options.enableCodeExecution,
      });

      switch (action.kind) {
        case 'final-answer':
          return { answer: action.answer, rawOutput: reply, status: 'final-answer', rounds: round, transcript };

        case 'expert-request': {
          const observation = await this.consultExperts(action.requests, transcript);
          transcript.push({
            role: 'user',
            content: observation,
            kind: 'expert',
            round,
            experts: action.requests.map(request => request.name),
          });
          break;
        }

        case 'code-block': {
          const output = await this.runCode(action.source);
          transcript.push({
            role: 'user',
            content: `Here is the output of the code when executed:\n\n${output}\n\n${this.options.intermediateFeedback}`,
            kind: 'tool',
            round,
          });
          break;
        }

        case 'continue':
          transcript.push({ role: 'user', content: conductor.errorMessage, kind: 'feedback', round });
          break;
      }

      if (transcriptTokens(transcript) > maxTranscriptTokens) {
        logger.warn(`Transcript exceeded ${maxTranscriptTokens} tokens after round ${round}`);
        return bestEffort(lastReply, 'token-budget', round, transcript);
      }
    }

    return bestEffort(lastReply, 'round-limit', maxRounds, transcript);
  }

  /**
   * Call every requested expert in order and build the observation message.
   */
  private async consultExperts(requests: ExpertRequest[], transcript: TranscriptEntry[]): Promise<string> {
    const expert = this.config.expert;
    const blocks: string[] = [];

    for (const request of requests) {
      const startTime = Date.now();
      const instruction = this.buildInstruction(request);

      const messages: ChatMessage[] = [...expert.messages];
      if (!this.options.freshEyes) {
        messages.push(...toChatMessages(transcript.filter(entry => entry.role !== 'system')));
      }
      messages.push({ role: 'user', content: instruction });

      const outputs = await this.model.generate(messages, expert.parameters);
      const processed: string[] = [];
      for (const output of outputs) {
        processed.push(
          request.name === PYTHON_EXPERT_NAME ? await this.runPythonExpert(output) : this.extractOutput(output),
        );
      }

      let block = processed
        .map(output => `${request.name}'s output:\n${TRIPLE_QUOTES}\n${output}\n${TRIPLE_QUOTES}`)
        .join('\n\n');

      if (expert.parameters.numReturnSequences > 1) {
        const summary = await this.summarize(request.instruction, block);
        block = `Here is the summary of ${request.name}'s outputs:\n\n${summary}`;
      }

      logger.expert(request.name, block.length, Date.now() - startTime);
      blocks.push(block);
    }

    return `${blocks.join('\n\n')}\n\n${this.options.intermediateFeedback}`;
  }

  private buildInstruction(request: ExpertRequest): string {
    let instruction = request.instruction;
    if (this.options.includeExpertName) {
      instruction = `You are ${request.name}.\n\n${instruction}`;
    }
    if (this.options.zeroShotCotInExperts) {
      instruction += `\n\n${ZERO_SHOT_COT_TRIGGER}`;
    }
    if (request.name === PYTHON_EXPERT_NAME) {
      instruction = `${this.options.expertPythonMessage}.\n\n${instruction}`;
    }
    return instruction;
  }

  /**
   * Keep the part after `* * *` and reject over-long answers
   */
  private extractOutput(output: string): string {
    if (!this.options.extractExpertOutput) {
      return output;
    }

    let extracted = output;
    const separatorAt = extracted.indexOf(EXPERT_OUTPUT_SEPARATOR);
    if (separatorAt !== -1) {
      extracted = extracted.slice(separatorAt + EXPERT_OUTPUT_SEPARATOR.length).split(EXPERT_OUTPUT_SEPARATOR)[0].trim();
    }
    return countWords(extracted) > MAX_EXPERT_OUTPUT_WORDS ? SOLUTION_TOO_LONG : extracted;
  }

  private async runPythonExpert(output: string): Promise<string> {
    if (!this.options.enableCodeExecution || !output.includes(RUN_CODE_MARKER)) {
      return output;
    }

    const block = extractCodeBlock(output.split(RUN_CODE_MARKER)[0]);
    if (!block) {
      return output;
    }

    const result = await this.runCode(block.source);
    return (
      `${output}\n\nHere is the Python code used to solve the problem:\n\n${block.source}` +
      `\n\nHere is the output of the code when executed:\n\n${result}`
    );
  }

  private async runCode(source: string): Promise<string> {
    try {
      const result = await this.codeRunner.execute(source, this.options.codeTimeoutMs);
      const output = formatExecutionOutput(result);
      logger.tool(output);
      return output;
    } catch (error: unknown) {
      if (error instanceof CodeExecutionError) {
        return `Error in execution: ${error.message}`;
      }
      throw error;
    }
  }

  private async summarize(instruction: string, outputs: string): Promise<string> {
    const summarizer = this.config.summarizer;
    const [summary = ''] = await this.model.generate(
      [
        ...summarizer.messages,
        {
          role: 'user',
          content:
            'Please provide a clear and concise summary of the expert outputs, emphasizing the key similarities and differences between them.' +
            `\n\nPrompt: ${instruction}\n\nOutput: ${outputs}`,
        },
      ],
      summarizer.parameters,
    );
    return summary;
  }
}

function toChatMessages(entries: TranscriptEntry[]): ChatMessage[] {
  return entries.map(({ role, content }) => ({ role, content }));
}

function transcriptTokens(transcript: TranscriptEntry[]): number {
  return estimateTokens(transcript.map(entry => entry.content).join(''));
}

function bestEffort(
  lastReply: string,
  status: TerminationReason,
  rounds: number,
  transcript: TranscriptEntry[],
): ScaffoldResult {
  return { answer: lastReply.trim(), rawOutput: lastReply, status, rounds, transcript };
}
