/**
 * metaprompt-lab - Scaffold Types
 * Role settings, dialogue transcript and reply variants
 */

import type { ChatMessage, ChatRole } from './provider.js';

/**
 * Sampling parameters for one model role
 */
export interface RoleParameters {
  temperature: number;
  topP: number;
  maxTokens: number;
  numReturnSequences: number;
}

/**
 * Prefix messages and sampling parameters for one model role
 */
export interface RoleSettings {
  messages: ChatMessage[];
  parameters: RoleParameters;
}

export interface ConductorSettings extends RoleSettings {
  /** Sent back when a reply carries no final answer, expert call or code */
  errorMessage: string;
  finalAnswerIndicator: string;
}

/**
 * Contents of a role configuration file (prompts/meta-config.json)
 */
export interface PromptConfig {
  conductor: ConductorSettings;
  expert: RoleSettings;
  summarizer: RoleSettings;
}

export interface ScaffoldOptions {
  maxRounds: number;
  /** Estimated token budget for the whole conductor transcript */
  maxTranscriptTokens: number;
  freshEyes: boolean;
  enableCodeExecution: boolean;
  includeExpertName: boolean;
  extractExpertOutput: boolean;
  zeroShotCotInExperts: boolean;
  expertPythonMessage: string;
  intermediateFeedback: string;
  codeTimeoutMs: number;
}

export type TranscriptKind = 'instruction' | 'conductor' | 'expert' | 'tool' | 'feedback';

export interface TranscriptEntry {
  role: ChatRole;
  content: string;
  kind: TranscriptKind;
  round: number;
  experts?: string[];
}

export type TerminationReason = 'final-answer' | 'round-limit' | 'token-budget';

export interface ScaffoldResult {
  answer: string;
  rawOutput: string;
  status: TerminationReason;
  rounds: number;
  transcript: TranscriptEntry[];
}

// ============================================
// Reply variants
// ============================================

export interface ExpertRequest {
  name: string;
  instruction: string;
}

export interface FinalAnswerAction {
  kind: 'final-answer';
  answer: string;
  text: string;
}

export interface ExpertRequestAction {
  kind: 'expert-request';
  requests: ExpertRequest[];
  text: string;
}

export interface CodeBlockAction {
  kind: 'code-block';
  source: string;
  language: string | null;
  text: string;
}

export interface ContinueAction {
  kind: 'continue';
  text: string;
}

export type ReplyAction = FinalAnswerAction | ExpertRequestAction | CodeBlockAction | ContinueAction;
