/**
 * Operator Lookup Tables
 */

import { TOKEN_TYPES, type TokenType } from '../token-types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '...': TOKEN_TYPES.ELLIPSIS,
  '===': TOKEN_TYPES.OPERATOR,
  '!==': TOKEN_TYPES.OPERATOR,
  '**=': TOKEN_TYPES.OPERATOR,
  '&&=': TOKEN_TYPES.OPERATOR,
  '||=': TOKEN_TYPES.OPERATOR,
  '??=': TOKEN_TYPES.OPERATOR,
};

/**
 * Two-character operator lookup table.
 * `<<` and `>>` are deliberately absent: angle brackets stay single tokens.
 */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '::': TOKEN_TYPES.DOUBLE_COLON,
  '..': TOKEN_TYPES.DOT_DOT,
  '?.': TOKEN_TYPES.QUESTION_DOT,
  '=>': TOKEN_TYPES.FAT_ARROW,
  '->': TOKEN_TYPES.THIN_ARROW,
  '==': TOKEN_TYPES.OPERATOR,
  '!=': TOKEN_TYPES.OPERATOR,
  '<=': TOKEN_TYPES.OPERATOR,
  '>=': TOKEN_TYPES.OPERATOR,
  '&&': TOKEN_TYPES.OPERATOR,
  '||': TOKEN_TYPES.OPERATOR,
  '??': TOKEN_TYPES.OPERATOR,
  '**': TOKEN_TYPES.OPERATOR,
  '++': TOKEN_TYPES.OPERATOR,
  '--': TOKEN_TYPES.OPERATOR,
  '+=': TOKEN_TYPES.OPERATOR,
  '-=': TOKEN_TYPES.OPERATOR,
  '*=': TOKEN_TYPES.OPERATOR,
  '/=': TOKEN_TYPES.OPERATOR,
  '%=': TOKEN_TYPES.OPERATOR,
  '&=': TOKEN_TYPES.OPERATOR,
  '|=': TOKEN_TYPES.OPERATOR,
  '^=': TOKEN_TYPES.OPERATOR,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  ':': TOKEN_TYPES.COLON,
  '.': TOKEN_TYPES.DOT,
  '@': TOKEN_TYPES.AT,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '+': TOKEN_TYPES.OPERATOR,
  '-': TOKEN_TYPES.OPERATOR,
  '*': TOKEN_TYPES.OPERATOR,
  '/': TOKEN_TYPES.OPERATOR,
  '%': TOKEN_TYPES.OPERATOR,
  '=': TOKEN_TYPES.OPERATOR,
  '!': TOKEN_TYPES.OPERATOR,
  '&': TOKEN_TYPES.OPERATOR,
  '|': TOKEN_TYPES.OPERATOR,
  '^': TOKEN_TYPES.OPERATOR,
  '~': TOKEN_TYPES.OPERATOR,
  '?': TOKEN_TYPES.OPERATOR,
  '#': TOKEN_TYPES.OPERATOR,
};
