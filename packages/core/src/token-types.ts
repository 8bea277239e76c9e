import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  LIFETIME: 'LIFETIME', // 'a, 'static, '_

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Paths and member access
  DOT: 'DOT', // .
  QUESTION_DOT: 'QUESTION_DOT', // ?.
  DOUBLE_COLON: 'DOUBLE_COLON', // ::
  COLON: 'COLON', // :

  // Markup punctuation
  AT: 'AT', // @ (attribute marker)
  DOT_DOT: 'DOT_DOT', // .. (spread child)
  ELLIPSIS: 'ELLIPSIS', // ...
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;

  // Angle brackets (always single characters so `>>` closes two lists)
  LT: 'LT', // <
  GT: 'GT', // >

  // Arrows
  FAT_ARROW: 'FAT_ARROW', // =>
  THIN_ARROW: 'THIN_ARROW', // ->

  // Every other operator
  OPERATOR: 'OPERATOR',

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Special
  COMMENT: 'COMMENT',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

/** Opening delimiter to its closing counterpart */
export const CLOSING_DELIMITERS: Readonly<Record<string, TokenType>> = {
  [TOKEN_TYPES.LPAREN]: TOKEN_TYPES.RPAREN,
  [TOKEN_TYPES.LBRACE]: TOKEN_TYPES.RBRACE,
  [TOKEN_TYPES.LBRACKET]: TOKEN_TYPES.RBRACKET,
};

export function isOpeningDelimiter(type: TokenType): boolean {
  return (
    type === TOKEN_TYPES.LPAREN ||
    type === TOKEN_TYPES.LBRACE ||
    type === TOKEN_TYPES.LBRACKET
  );
}

export function isClosingDelimiter(type: TokenType): boolean {
  return (
    type === TOKEN_TYPES.RPAREN ||
    type === TOKEN_TYPES.RBRACE ||
    type === TOKEN_TYPES.RBRACKET
  );
}
