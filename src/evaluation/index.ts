/**
 * metaprompt-lab - Evaluation Module Exports
 */

export * from './Evaluator.js';
export * from './scorers.js';
export { normalizeAnswer, removePunctuation } from './normalize.js';
export { evaluateExpression, expressionNumbers } from './expression.js';
export {
  sonnetErrors,
  schemeErrors,
  syllableVariations,
  splitPoem,
  parseSonnetTarget,
  getPronouncingDictionary,
  PronouncingDictionary,
  DEFAULT_SONNET_SCHEME,
  type SonnetErrors,
  type RhymeError,
  type SyllableError,
} from './sonnet.js';
