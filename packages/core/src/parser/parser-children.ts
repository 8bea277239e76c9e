/**
 * Parser Extension: Children
 * Child lists and the four child forms
 */

import { Parser } from './parser.js';
import type { ChildNode } from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { findRegionEnd, isEmptyBraces } from './helpers.js';
import { regionOf, sliceText, spanOf, tokenAt } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseChildren(from: number, to: number): ChildNode[];
    parseChild(from: number, to: number): ChildNode;
  }
}

// ============================================================
// CHILD LISTS
// ============================================================

/**
 * Parse the comma-separated children between `{` and `}`.
 * A trailing comma is allowed.
 */
Parser.prototype.parseChildren = function (
  this: Parser,
  from: number,
  to: number
): ChildNode[] {
  const children: ChildNode[] = [];
  let pos = from;
  while (pos < to) {
    const end = findRegionEnd(this.state, pos, to);
    if (end === pos) {
      const token = tokenAt(this.state, pos);
      throw createError('EMPTY_CHILD', { token: token.value }, token.span);
    }
    children.push(this.parseChild(pos, end));
    pos = end < to ? end + 1 : end;
  }
  return children;
};

// ============================================================
// CHILD FORMS
// ============================================================

/**
 * Classify one child region, checked in order:
 * - `..expr` -> Spread
 * - `.name(...)` -> MethodChainInsertion
 * - `head [@[...]] { ... }` -> Nested
 * - anything else -> Literal
 */
Parser.prototype.parseChild = function (
  this: Parser,
  from: number,
  to: number
): ChildNode {
  const first = tokenAt(this.state, from);
  const span = spanOf(this.state, from, to - 1);

  switch (first.type) {
    case TOKEN_TYPES.DOT_DOT: {
      if (from + 1 === to) {
        throw createError('MALFORMED_SPREAD', {}, first.span);
      }
      return { type: 'Spread', expr: regionOf(this.state, from + 1, to), span };
    }

    case TOKEN_TYPES.ELLIPSIS:
      throw createError(
        'THREE_DOT_SPREAD',
        { expr: from + 1 < to ? sliceText(this.state, from + 1, to) : 'items' },
        first.span
      );

    case TOKEN_TYPES.DOT: {
      const name = tokenAt(this.state, from + 1);
      if (from + 1 === to || name.type !== TOKEN_TYPES.IDENTIFIER) {
        throw createError('MALFORMED_CHAIN', { token: name.value }, name.span);
      }
      return {
        type: 'MethodChainInsertion',
        chain: regionOf(this.state, from, to),
        span,
      };
    }

    case TOKEN_TYPES.LBRACE:
      if (isEmptyBraces(this.state, from, to)) {
        throw createError('EMPTY_BRACES_CHILD', {}, span);
      }
      break;
  }

  const element = this.parseElement(from, to);
  if (element !== null) {
    return { type: 'Nested', element, span };
  }
  return { type: 'Literal', expr: regionOf(this.state, from, to), span };
};
