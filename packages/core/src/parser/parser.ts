/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { MarkupRoot } from '../ast-nodes.js';
import type { MarkupConfig } from '../config.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts the tokens of one markup body into a tree.
 *
 * Methods are organized across multiple files:
 * - parser-markup.ts: Root body, passthrough, trailing tokens
 * - parser-element.ts: Heads, bodies, deferred wrappers
 * - parser-attributes.ts: `@[...]` attribute lists
 * - parser-children.ts: Child lists and child forms
 *
 * Everything between the markup punctuation stays opaque: expressions
 * are sliced from `source` by token offsets, so the offsets must index
 * into `source`.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, source, DEFAULT_CONFIG);
 * const root = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and delimiter pairs */
  state: ParserState;

  constructor(tokens: readonly Token[], source: string, config: MarkupConfig) {
    this.state = createParserState(tokens, source, config);
  }

  /**
   * Parse tokens into a complete markup tree.
   */
  parse(): MarkupRoot {
    return this.parseMarkup();
  }
}
