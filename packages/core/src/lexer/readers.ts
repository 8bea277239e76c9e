/**
 * Token Readers
 * Functions to read specific token types from source
 */

import { createError } from '../error-classes.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/**
 * Read a single- or double-quoted string.
 * The token value is the raw text, quotes and escapes included.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state); // consume opening quote
  let value = quote;

  while (!isAtEnd(state) && peek(state) !== quote) {
    const ch = peek(state);
    if (ch === '\n') break;
    if (ch === '\\') {
      value += advance(state); // consume backslash
      if (isAtEnd(state)) break;
    }
    value += advance(state);
  }

  if (peek(state) !== quote) {
    throw createError(
      'UNTERMINATED_STRING',
      { quote },
      { start, end: currentLocation(state) }
    );
  }
  value += advance(state); // consume closing quote

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * A `'` opens a lifetime or loop label when a name follows and the name is
 * not closed by another `'` (`'a'` and `'ok'` stay quoted strings).
 */
export function isLifetimeStart(state: LexerState): boolean {
  if (!isIdentifierStart(peek(state, 1))) return false;
  let i = 2;
  while (isIdentifierChar(peek(state, i))) i++;
  return peek(state, i) !== "'";
}

/** Read `'name` as one token */
export function readLifetime(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state); // consume '

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.LIFETIME, value, start, currentLocation(state));
}

/**
 * Length of a raw string opener at the current position (`r"`, `r#"`,
 * `br##"`), or 0 when there is none.
 */
export function rawStringPrefixLength(state: LexerState): number {
  let i = peek(state) === 'b' ? 1 : 0;
  if (peek(state, i) !== 'r') return 0;
  i++;
  while (peek(state, i) === '#') i++;
  return peek(state, i) === '"' ? i + 1 : 0;
}

/**
 * Read a raw string. It ends at a `"` followed by as many `#` as the
 * opener carried, and may span lines.
 */
export function readRawString(state: LexerState, prefixLength: number): Token {
  const start = currentLocation(state);
  let value = '';
  for (let i = 0; i < prefixLength; i++) {
    value += advance(state);
  }
  const hashes = value.split('#').length - 1;
  const closer = '"' + '#'.repeat(hashes);

  while (peekString(state, closer.length) !== closer) {
    if (isAtEnd(state)) {
      throw createError(
        'UNTERMINATED_STRING',
        { quote: closer },
        { start, end: currentLocation(state) }
      );
    }
    value += advance(state);
  }
  for (let i = 0; i < closer.length; i++) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

function readDigits(state: LexerState, accept: (ch: string) => boolean): string {
  let value = '';
  while (!isAtEnd(state) && (accept(peek(state)) || peek(state) === '_')) {
    value += advance(state);
  }
  return value;
}

/**
 * Read a numeric literal: decimal with optional fraction and exponent,
 * or a 0x/0b/0o prefixed integer, followed by an optional type suffix
 * such as `f32` or `n`.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  const prefix = peek(state, 1).toLowerCase();
  if (peek(state) === '0' && (prefix === 'x' || prefix === 'b' || prefix === 'o')) {
    value += advance(state);
    value += advance(state);
    value += readDigits(state, isIdentifierChar);
    return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
  }

  value += readDigits(state, isDigit);

  // `1..2` is a range, not a fraction
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    value += readDigits(state, isDigit);
  }

  const exponent = peek(state);
  if (exponent === 'e' || exponent === 'E') {
    const sign = peek(state, 1);
    if (isDigit(sign)) {
      value += advance(state);
      value += readDigits(state, isDigit);
    } else if ((sign === '+' || sign === '-') && isDigit(peek(state, 2))) {
      value += advance(state);
      value += advance(state);
      value += readDigits(state, isDigit);
    }
  }

  // Type suffix: 1u8, 2.0f32, 10n
  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.IDENTIFIER, value, start, currentLocation(state));
}
