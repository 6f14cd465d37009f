/**
 * metaprompt-lab - Scaffold Module Exports
 */

export { MetaScaffold, type MetaScaffoldDependencies } from './MetaScaffold.js';
export {
  parseReply,
  extractFinalAnswer,
  extractExpertRequests,
  extractCodeBlock,
  EXPERT_PATTERN,
  type ParseOptions,
} from './ReplyParser.js';
export { ExpertIdentityGenerator, buildIdentityPrompt, buildExpertPromptingQuestion } from './ExpertIdentity.js';
