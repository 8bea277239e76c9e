/**
 * Parser Extension: Markup Root
 * The single root of a markup body
 */

import { Parser } from './parser.js';
import type { MarkupRoot, PassthroughNode } from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { findRegionEnd } from './helpers.js';
import {
  check,
  current,
  endIndex,
  isAtEnd,
  matchingClose,
  regionOf,
  sliceText,
  spanOf,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseMarkup(): MarkupRoot;
    parsePassthrough(): PassthroughNode | null;
  }
}

// ============================================================
// ROOT PARSING
// ============================================================

Parser.prototype.parseMarkup = function (this: Parser): MarkupRoot {
  const start = this.state.pos;

  if (isAtEnd(this.state)) {
    throw createError('EMPTY_MARKUP', {}, current(this.state).span);
  }

  const passthrough = this.parsePassthrough();
  if (passthrough !== null) {
    return { type: 'Markup', body: passthrough, span: passthrough.span };
  }

  const end = findRegionEnd(this.state, start, endIndex(this.state));
  if (end === start) {
    const stray = current(this.state);
    throw createError('MISSING_BODY', { head: stray.value }, stray.span);
  }

  const element = this.parseElement(start, end);
  if (element === null) {
    throw createError(
      'MISSING_BODY',
      { head: sliceText(this.state, start, end) },
      spanOf(this.state, start, end - 1)
    );
  }

  this.state.pos = end;
  if (!isAtEnd(this.state)) {
    const extra = current(this.state);
    throw createError('UNEXPECTED_AFTER_ROOT', { token: extra.value }, extra.span);
  }

  return { type: 'Markup', body: element, span: element.span };
};

/**
 * A parenthesized expression spanning the whole body is emitted unchanged.
 * Anything after the closing `)` makes it an ordinary head instead.
 */
Parser.prototype.parsePassthrough = function (
  this: Parser
): PassthroughNode | null {
  if (!check(this.state, TOKEN_TYPES.LPAREN)) return null;

  const start = this.state.pos;
  const close = matchingClose(this.state, start);
  if (close + 1 !== endIndex(this.state)) return null;

  this.state.pos = close + 1;
  const expr = regionOf(this.state, start, close + 1);
  return { type: 'Passthrough', expr, span: expr.span };
};
