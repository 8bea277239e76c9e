/**
 * chainmark
 * Turns brace-delimited UI markup into chained builder calls.
 */

// ============================================================
// PIPELINE
// ============================================================
export {
  createLexerState,
  nextToken,
  tokenize,
  type LexerState,
  type TokenizeOptions,
} from './lexer/index.js';
export {
  parseMarkup,
  parseTokens,
  Parser,
  type ParseOptions,
} from './parser/index.js';
export {
  classifyHeadTokens,
  renderBase,
  strategyFor,
  type GenerationStrategy,
  type HeadClass,
} from './classifier.js';
export { generate, generateNode } from './generator.js';
export {
  transformMarkup,
  transformSource,
  type MarkupResult,
  type SourceTransformOptions,
  type SourceTransformResult,
  type TransformOptions,
} from './transform.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  DEFAULT_CONFIG,
  DEFAULT_CONVENTIONS,
  resolveConfig,
  type EmitConventions,
  type MarkupConfig,
  type MarkupConfigInput,
} from './config.js';

// ============================================================
// ERRORS AND DIAGNOSTICS
// ============================================================
export {
  ChainmarkError,
  createError,
  LexerError,
  MarkupSyntaxError,
  StructuralError,
  type ChainmarkErrorData,
} from './error-classes.js';
export {
  MESSAGES,
  renderMessage,
  type MessageCategory,
  type MessageDefinition,
  type MessageId,
} from './messages.js';
export {
  toDiagnostic,
  type Diagnostic,
  type DiagnosticKind,
} from './diagnostics.js';

// ============================================================
// TYPES
// ============================================================
export type * from './ast-nodes.js';
export {
  joinSpans,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export { VERSION } from './version.js';
