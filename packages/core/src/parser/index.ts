/**
 * chainmark Parser
 * Main entry point and re-exports
 */

import type { MarkupRoot } from '../ast-nodes.js';
import { DEFAULT_CONFIG, type MarkupConfig } from '../config.js';
import { tokenize } from '../lexer/index.js';
import type { Token } from '../token-types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-markup.js';
import './parser-element.js';
import './parser-attributes.js';
import './parser-children.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export interface ParseOptions {
  config?: MarkupConfig | undefined;
}

/**
 * Parse a markup body (the text between the macro braces) into a tree.
 *
 * Throws a ChainmarkError on the first error.
 *
 * @example
 * ```typescript
 * const root = parseMarkup('div @[flex] { "Hello" }');
 * ```
 */
export function parseMarkup(
  source: string,
  options: ParseOptions = {}
): MarkupRoot {
  const tokens = tokenize(source);
  return parseTokens(tokens, source, options);
}

/**
 * Parse already tokenized markup. Token offsets must index into `source`,
 * which lets a body be parsed in place inside a larger file.
 */
export function parseTokens(
  tokens: readonly Token[],
  source: string,
  options: ParseOptions = {}
): MarkupRoot {
  const parser = new Parser(tokens, source, options.config ?? DEFAULT_CONFIG);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
