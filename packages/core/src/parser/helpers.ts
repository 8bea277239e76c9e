/**
 * Parser Helpers
 * Region boundaries and lookahead predicates over token ranges.
 * Ranges are half-open: `[from, to)`.
 * @internal This module contains internal parser utilities
 */

import { createError } from '../error-classes.js';
import { isClosingDelimiter, isOpeningDelimiter, TOKEN_TYPES } from '../token-types.js';
import { matchingClose, type ParserState, tokenAt } from './state.js';

// ============================================================
// TYPE ARGUMENTS
// ============================================================

/** Operators that appear inside type-argument lists: `&str`, `A | B`, `T?` */
const TYPE_OPERATORS = new Set(['&', '|', '?', '*', '+', '!']);

/**
 * Try to read a type-argument list starting at the `<` at `index`.
 *
 * After `::` the list is certain. After a bare identifier it is only
 * taken when its contents look like types and the `>` is followed by a
 * call, a path separator, or the end of the range; otherwise the `<` is
 * a comparison.
 *
 * @returns index after the closing `>`, or -1 when this is not a list
 * @internal
 */
export function matchTypeArguments(
  state: ParserState,
  index: number,
  to: number
): number {
  const before = tokenAt(state, index - 1).type;
  const turbofish = index > 0 && before === TOKEN_TYPES.DOUBLE_COLON;
  if (!turbofish && (index === 0 || before !== TOKEN_TYPES.IDENTIFIER)) {
    return -1;
  }

  let depth = 1;
  let i = index + 1;
  while (i < to) {
    const token = tokenAt(state, i);
    switch (token.type) {
      case TOKEN_TYPES.LT:
        depth++;
        i++;
        continue;
      case TOKEN_TYPES.GT: {
        depth--;
        i++;
        if (depth > 0) continue;
        if (turbofish || i === to) return i;
        const after = tokenAt(state, i).type;
        return after === TOKEN_TYPES.LPAREN ||
          after === TOKEN_TYPES.DOUBLE_COLON
          ? i
          : -1;
      }
      case TOKEN_TYPES.LPAREN:
      case TOKEN_TYPES.LBRACKET:
        i = matchingClose(state, i) + 1;
        continue;
      case TOKEN_TYPES.IDENTIFIER:
      case TOKEN_TYPES.LIFETIME:
      case TOKEN_TYPES.COMMA:
      case TOKEN_TYPES.DOUBLE_COLON:
      case TOKEN_TYPES.DOT:
      case TOKEN_TYPES.STRING:
      case TOKEN_TYPES.NUMBER:
      case TOKEN_TYPES.SEMICOLON:
      case TOKEN_TYPES.FAT_ARROW:
      case TOKEN_TYPES.THIN_ARROW:
        i++;
        continue;
      case TOKEN_TYPES.OPERATOR:
        if (!TYPE_OPERATORS.has(token.value)) return -1;
        i++;
        continue;
      default:
        return -1;
    }
  }
  return -1;
}

// ============================================================
// CLOSURE PARAMETERS
// ============================================================

/**
 * Check whether the `|` at `index` opens closure parameters rather than
 * being a bitwise or: it starts the region, follows an operator or `:`,
 * or follows `move`.
 */
function opensClosure(state: ParserState, index: number, from: number): boolean {
  const token = tokenAt(state, index);
  if (token.type !== TOKEN_TYPES.OPERATOR || token.value !== '|') return false;
  if (index === from) return true;

  const before = tokenAt(state, index - 1);
  switch (before.type) {
    case TOKEN_TYPES.COLON:
    case TOKEN_TYPES.OPERATOR:
    case TOKEN_TYPES.FAT_ARROW:
      return true;
    case TOKEN_TYPES.IDENTIFIER:
      return before.value === 'move';
    default:
      return false;
  }
}

/**
 * Index after the `|` closing the parameter list opened at `index`,
 * or -1 when the list does not close inside the range.
 */
function closureParamsEnd(state: ParserState, index: number, to: number): number {
  let i = index + 1;
  while (i < to) {
    const token = tokenAt(state, i);
    if (isOpeningDelimiter(token.type)) {
      i = matchingClose(state, i) + 1;
      continue;
    }
    if (token.type === TOKEN_TYPES.OPERATOR && token.value === '|') return i + 1;
    if (isClosingDelimiter(token.type) || token.type === TOKEN_TYPES.EOF) {
      return -1;
    }
    i++;
  }
  return -1;
}

// ============================================================
// REGION BOUNDARIES
// ============================================================

/**
 * Find where the region starting at `from` ends: the first comma at
 * nesting depth zero, or `to`. Commas inside `()`, `[]`, `{}`,
 * type-argument lists and closure parameters (`|a, b|`) do not end a region.
 * @internal
 */
export function findRegionEnd(
  state: ParserState,
  from: number,
  to: number
): number {
  let i = from;
  while (i < to) {
    const token = tokenAt(state, i);
    if (isOpeningDelimiter(token.type)) {
      i = matchingClose(state, i) + 1;
      continue;
    }
    if (token.type === TOKEN_TYPES.COMMA) return i;
    if (opensClosure(state, i, from)) {
      const after = closureParamsEnd(state, i, to);
      if (after > 0) {
        i = after;
        continue;
      }
    }
    if (isClosingDelimiter(token.type) || token.type === TOKEN_TYPES.EOF) {
      return i;
    }
    if (token.type === TOKEN_TYPES.LT && i > from) {
      const after = matchTypeArguments(state, i, to);
      if (after > 0) {
        i = after;
        continue;
      }
    }
    i++;
  }
  return to;
}

/**
 * Index of the first `@` or `{` at depth zero in `[from, to)`, or `to`.
 * That token is where an element head would stop.
 * @internal
 */
export function findHeadEnd(
  state: ParserState,
  from: number,
  to: number
): number {
  let i = from;
  while (i < to) {
    const token = tokenAt(state, i);
    if (token.type === TOKEN_TYPES.AT || token.type === TOKEN_TYPES.LBRACE) {
      return i;
    }
    if (isOpeningDelimiter(token.type)) {
      i = matchingClose(state, i) + 1;
      continue;
    }
    i++;
  }
  return to;
}

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check that `[from, to)` reads as an element head: an identifier or a
 * parenthesized expression followed only by member access, path
 * segments, calls, indexing, type arguments and `!` (macro calls, non-null).
 *
 * Matches: `div`, `ui::Header`, `Header::with_label("x")`, `self.row(i)`,
 * `format!("x")`, `List::<Item>::new()`, `(make)()`
 * @internal
 */
export function isHeadShaped(
  state: ParserState,
  from: number,
  to: number
): boolean {
  if (from >= to) return false;

  const first = tokenAt(state, from);
  let i: number;
  if (first.type === TOKEN_TYPES.IDENTIFIER) {
    i = from + 1;
  } else if (first.type === TOKEN_TYPES.LPAREN) {
    i = matchingClose(state, from) + 1;
  } else {
    return false;
  }

  while (i < to) {
    const token = tokenAt(state, i);
    const next = i + 1 < to ? tokenAt(state, i + 1) : undefined;

    switch (token.type) {
      case TOKEN_TYPES.DOT:
      case TOKEN_TYPES.QUESTION_DOT:
        if (next?.type !== TOKEN_TYPES.IDENTIFIER) return false;
        i += 2;
        break;
      case TOKEN_TYPES.DOUBLE_COLON:
        if (next?.type === TOKEN_TYPES.IDENTIFIER) {
          i += 2;
        } else if (next?.type === TOKEN_TYPES.LT) {
          i = matchTypeArguments(state, i + 1, to);
          if (i < 0) return false;
        } else {
          return false;
        }
        break;
      case TOKEN_TYPES.LT:
        i = matchTypeArguments(state, i, to);
        if (i < 0) return false;
        break;
      case TOKEN_TYPES.LPAREN:
      case TOKEN_TYPES.LBRACKET:
        i = matchingClose(state, i) + 1;
        break;
      case TOKEN_TYPES.OPERATOR:
        if (token.value !== '!') return false;
        i++;
        break;
      default:
        return false;
    }
  }
  return true;
}

/**
 * Check for `{}` spanning exactly `[from, to)`
 * @internal
 */
export function isEmptyBraces(
  state: ParserState,
  from: number,
  to: number
): boolean {
  return (
    to === from + 2 &&
    tokenAt(state, from).type === TOKEN_TYPES.LBRACE &&
    tokenAt(state, from + 1).type === TOKEN_TYPES.RBRACE
  );
}

/** @internal */
export function assertAttributeListOpen(
  state: ParserState,
  markerIndex: number,
  to: number
): number {
  const open = markerIndex + 1;
  if (open >= to || tokenAt(state, open).type !== TOKEN_TYPES.LBRACKET) {
    throw createError(
      'STRAY_ATTRIBUTE_MARKER',
      {},
      tokenAt(state, markerIndex).span
    );
  }
  return open;
}
