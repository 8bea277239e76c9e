/**
 * Parser Extension: Attributes
 * `@[flag, key: value, key: (a, b)]`
 */

import { Parser } from './parser.js';
import type { AttributeNode, ExprRegion } from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import { findRegionEnd } from './helpers.js';
import { matchingClose, regionOf, spanOf, tokenAt } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseAttributes(from: number, to: number, listSpan: SourceSpan): AttributeNode[];
    parseAttribute(from: number, to: number): AttributeNode;
    parseArgumentGroup(open: number, close: number): ExprRegion[] | null;
  }
}

// ============================================================
// ATTRIBUTE LISTS
// ============================================================

/**
 * Parse the comma-separated attributes between `@[` and `]`.
 * A trailing comma is allowed; an empty list is not.
 */
Parser.prototype.parseAttributes = function (
  this: Parser,
  from: number,
  to: number,
  listSpan: SourceSpan
): AttributeNode[] {
  if (from === to) {
    throw createError('EMPTY_ATTRIBUTES', {}, listSpan);
  }

  const attributes: AttributeNode[] = [];
  let pos = from;
  while (pos < to) {
    const end = findRegionEnd(this.state, pos, to);
    if (end === pos) {
      const token = tokenAt(this.state, pos);
      throw createError('EXPECTED_ATTRIBUTE_NAME', { token: token.value }, token.span);
    }
    attributes.push(this.parseAttribute(pos, end));
    pos = end < to ? end + 1 : end;
  }
  return attributes;
};

/**
 * One attribute: `name` or `name: value`.
 * A value that is a single parenthesized group with a top-level comma
 * (or nothing inside) supplies several call arguments.
 */
Parser.prototype.parseAttribute = function (
  this: Parser,
  from: number,
  to: number
): AttributeNode {
  const nameToken = tokenAt(this.state, from);
  if (nameToken.type !== TOKEN_TYPES.IDENTIFIER) {
    throw createError(
      'EXPECTED_ATTRIBUTE_NAME',
      { token: nameToken.value },
      nameToken.span
    );
  }
  const name = nameToken.value;
  const span = spanOf(this.state, from, to - 1);

  if (to === from + 1) {
    return { type: 'Flag', name, span };
  }

  const separator = tokenAt(this.state, from + 1);
  if (separator.type !== TOKEN_TYPES.COLON) {
    throw createError(
      'EXPECTED_ATTRIBUTE_COLON',
      { name, token: separator.value },
      separator.span
    );
  }

  const valueStart = from + 2;
  if (valueStart === to) {
    throw createError(
      'MISSING_ATTRIBUTE_VALUE',
      { name },
      spanOf(this.state, from, from + 1)
    );
  }

  if (tokenAt(this.state, valueStart).type === TOKEN_TYPES.LPAREN) {
    const close = matchingClose(this.state, valueStart);
    if (close === to - 1) {
      const values = this.parseArgumentGroup(valueStart, close);
      if (values !== null) {
        return { type: 'KeyMultiValue', name, values, span };
      }
    }
  }

  return { type: 'KeyValue', name, value: regionOf(this.state, valueStart, to), span };
};

/**
 * Split `( ... )` into arguments, or return null when the parentheses
 * only group a single expression such as `(a + b)`.
 */
Parser.prototype.parseArgumentGroup = function (
  this: Parser,
  open: number,
  close: number
): ExprRegion[] | null {
  const values: ExprRegion[] = [];
  let sawComma = false;
  let pos = open + 1;

  while (pos < close) {
    const end = findRegionEnd(this.state, pos, close);
    if (end === pos) {
      const token = tokenAt(this.state, pos);
      throw createError('EMPTY_ARGUMENT', { token: token.value }, token.span);
    }
    values.push(regionOf(this.state, pos, end));
    if (end < close) {
      sawComma = true;
      pos = end + 1;
    } else {
      pos = end;
    }
  }

  return sawComma || values.length === 0 ? values : null;
};
