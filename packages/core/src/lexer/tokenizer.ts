/**
 * Tokenizer
 * Main tokenization logic
 */

import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  isLifetimeStart,
  rawStringPrefixLength,
  readIdentifier,
  readLifetime,
  readNumber,
  readRawString,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

function readComment(state: LexerState): Token | null {
  const opener = peekString(state, 2);
  if (opener !== '//' && opener !== '/*') {
    return null;
  }

  const start = currentLocation(state);
  let value = '';

  if (opener === '//') {
    while (!isAtEnd(state) && peek(state) !== '\n') {
      value += advance(state);
    }
    return makeToken(TOKEN_TYPES.COMMENT, value, start, currentLocation(state));
  }

  // Block comments nest: `/* a /* b */ c */` is one comment
  let depth = 0;
  do {
    if (isAtEnd(state)) {
      throw createError(
        'UNTERMINATED_COMMENT',
        {},
        { start, end: currentLocation(state) }
      );
    }
    const pair = peekString(state, 2);
    if (pair === '/*' || pair === '*/') {
      depth += pair === '/*' ? 1 : -1;
      value += advance(state);
      value += advance(state);
    } else {
      value += advance(state);
    }
  } while (depth > 0);
  return makeToken(TOKEN_TYPES.COMMENT, value, start, currentLocation(state));
}

/**
 * Read a template literal. Substitutions are tokenized with the regular
 * rules so nested strings and braces cannot end the literal early.
 */
function readTemplate(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;
  advance(state); // consume opening backtick

  while (peek(state) !== '`') {
    if (isAtEnd(state)) {
      throw createError(
        'UNTERMINATED_TEMPLATE',
        {},
        { start, end: currentLocation(state) }
      );
    }

    if (peek(state) === '\\') {
      advance(state);
      advance(state);
      continue;
    }

    if (peekString(state, 2) === '${') {
      advance(state);
      advance(state);
      let depth = 1;
      while (depth > 0) {
        const token = nextToken(state);
        if (token.type === TOKEN_TYPES.EOF) {
          throw createError(
            'UNTERMINATED_TEMPLATE',
            {},
            { start, end: token.span.end }
          );
        }
        if (token.type === TOKEN_TYPES.LBRACE) depth++;
        if (token.type === TOKEN_TYPES.RBRACE) depth--;
      }
      continue;
    }

    advance(state);
  }

  advance(state); // consume closing backtick
  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  const commentToken = readComment(state);
  if (commentToken !== null) {
    return commentToken;
  }

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === "'" && isLifetimeStart(state)) {
    return readLifetime(state);
  }

  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  if (ch === '`') {
    return readTemplate(state);
  }

  // Number (positive only - sign is an operator)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  const rawPrefix = rawStringPrefixLength(state);
  if (rawPrefix > 0) {
    return readRawString(state, rawPrefix);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Operators (lookup tables, longest match first)
  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw createError(
    'UNEXPECTED_CHARACTER',
    { char: JSON.stringify(ch) },
    { start, end: start }
  );
}

export interface TokenizeOptions {
  includeComments?: boolean;
}

export function tokenize(
  source: string,
  baseLocation?: SourceLocation,
  options?: TokenizeOptions
): Token[] {
  const state = createLexerState(source, baseLocation);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  // Filter out COMMENT tokens unless includeComments is true
  if (options?.includeComments !== true) {
    return tokens.filter((t) => t.type !== TOKEN_TYPES.COMMENT);
  }

  return tokens;
}
