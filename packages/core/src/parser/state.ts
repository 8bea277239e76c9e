/**
 * Parser State
 * Token navigation, delimiter pairing and source slicing
 */

import type { ExprRegion } from '../ast-nodes.js';
import type { MarkupConfig } from '../config.js';
import { createError } from '../error-classes.js';
import { joinSpans, type SourceSpan } from '../source-location.js';
import {
  CLOSING_DELIMITERS,
  isClosingDelimiter,
  isOpeningDelimiter,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  /** Tokens of one markup body, ending with EOF */
  readonly tokens: readonly Token[];
  pos: number;
  /** Text the token offsets index into */
  readonly source: string;
  readonly config: MarkupConfig;
  /** Opening delimiter index to its closing delimiter index */
  readonly pairs: ReadonlyMap<number, number>;
}

export function createParserState(
  tokens: readonly Token[],
  source: string,
  config: MarkupConfig
): ParserState {
  return {
    tokens,
    pos: 0,
    source,
    config,
    pairs: pairDelimiters(tokens),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function tokenAt(state: ParserState, index: number): Token {
  const token = state.tokens[index];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return tokenAt(state, state.pos);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** Index of the EOF token */
export function endIndex(state: ParserState): number {
  return state.tokens.length - 1;
}

// ============================================================
// DELIMITERS
// ============================================================

function closerText(type: TokenType): string {
  switch (type) {
    case TOKEN_TYPES.RPAREN:
      return ')';
    case TOKEN_TYPES.RBRACE:
      return '}';
    default:
      return ']';
  }
}

/**
 * Match every `(` `[` `{` with its closer.
 * Angle brackets are not paired here; they only group in type-argument
 * position, which needs lookahead.
 *
 * @throws MarkupSyntaxError on an unclosed, mismatched or stray delimiter
 */
export function pairDelimiters(
  tokens: readonly Token[]
): Map<number, number> {
  const pairs = new Map<number, number>();
  const open: number[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token.type === TOKEN_TYPES.EOF) break;

    if (isOpeningDelimiter(token.type)) {
      open.push(i);
      continue;
    }
    if (!isClosingDelimiter(token.type)) continue;

    const openIndex = open.pop();
    const opener = openIndex === undefined ? undefined : tokens[openIndex];
    if (openIndex === undefined || opener === undefined) {
      throw createError(
        'UNEXPECTED_CLOSER',
        { token: token.value },
        token.span
      );
    }

    const expected = CLOSING_DELIMITERS[opener.type];
    if (expected !== token.type) {
      throw createError(
        'MISMATCHED_DELIMITER',
        {
          expected: expected === undefined ? '' : closerText(expected),
          open: opener.value,
          found: token.value,
        },
        token.span
      );
    }
    pairs.set(openIndex, i);
  }

  const innermost = open.pop();
  const unclosed = innermost === undefined ? undefined : tokens[innermost];
  if (unclosed !== undefined) {
    const expected = CLOSING_DELIMITERS[unclosed.type];
    throw createError(
      'UNTERMINATED_GROUP',
      {
        open: unclosed.value,
        close: expected === undefined ? '' : closerText(expected),
      },
      unclosed.span
    );
  }

  return pairs;
}

/** Index of the closer matching the opener at `index` */
export function matchingClose(state: ParserState, index: number): number {
  const close = state.pairs.get(index);
  if (close === undefined) {
    throw new Error(`No matching delimiter for token ${index}`);
  }
  return close;
}

// ============================================================
// SPANS AND REGIONS
// ============================================================

/** Span from the token at `first` through the token at `last` (inclusive) */
export function spanOf(
  state: ParserState,
  first: number,
  last: number
): SourceSpan {
  return joinSpans(tokenAt(state, first).span, tokenAt(state, last).span);
}

/** Source text of tokens `[from, to)`, exactly as written */
export function sliceText(state: ParserState, from: number, to: number): string {
  const start = tokenAt(state, from).span.start.offset;
  const end = tokenAt(state, to - 1).span.end.offset;
  return state.source.slice(start, end);
}

/** Opaque expression region over tokens `[from, to)` */
export function regionOf(
  state: ParserState,
  from: number,
  to: number
): ExprRegion {
  return {
    text: sliceText(state, from, to),
    span: spanOf(state, from, to - 1),
  };
}
