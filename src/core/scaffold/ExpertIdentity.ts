/**
 * metaprompt-lab - Expert Identity
 * Writes a second-person expert persona for a question from a few-shot template
 */

import type { LanguageModel } from '../LanguageModel.js';
import type { RoleParameters } from '../../types/index.js';

export class ExpertIdentityGenerator {
  constructor(
    private model: LanguageModel,
    private template: string,
    private parameters: RoleParameters,
  ) {}

  /**
   * One model call; the persona is the first returned sequence, trimmed.
   */
  async generate(instruction: string): Promise<string> {
    const [identity = ''] = await this.model.generate(
      [{ role: 'user', content: buildIdentityPrompt(this.template, instruction) }],
      { ...this.parameters, numReturnSequences: 1 },
    );
    return identity.trim();
  }
}

export function buildIdentityPrompt(template: string, instruction: string): string {
  return `${template.trim()}\n\n[Instruction]: ${instruction}\n[Agent Description]:`;
}

/**
 * User turn asking the persona to answer the task
 */
export function buildExpertPromptingQuestion(identity: string, description: string, input: string): string {
  return (
    `${identity}\n\nNow given the above identity background, please answer the following question:` +
    `\n\nQuestion: ${description}\n\n${input}`
  );
}
