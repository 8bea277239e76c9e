/**
 * chainmark Error Classes and Factory
 * Span-carrying errors raised while tokenizing, parsing and checking markup
 */

import type { SourceSpan } from './source-location.js';
import {
  MESSAGES,
  renderMessage,
  type MessageDefinition,
  type MessageId,
} from './messages.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ChainmarkErrorData {
  readonly message: string;
  readonly span: SourceSpan;
  readonly hint?: string | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all chainmark errors.
 * The message is suffixed with the start position; `toData()` returns it without.
 */
export class ChainmarkError extends Error {
  readonly span: SourceSpan;
  readonly hint: string | undefined;

  constructor(data: ChainmarkErrorData) {
    const { line, column } = data.span.start;
    super(`${data.message} at ${line}:${column}`);
    this.name = 'ChainmarkError';
    this.span = data.span;
    this.hint = data.hint;
  }

  /** Get structured error data for custom formatting */
  toData(): ChainmarkErrorData {
    return {
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      span: this.span,
      hint: this.hint,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Grammar violations found by the parser */
export class MarkupSyntaxError extends ChainmarkError {
  constructor(data: ChainmarkErrorData) {
    super(data);
    this.name = 'MarkupSyntaxError';
  }
}

/** Grammar violations found while scanning characters */
export class LexerError extends MarkupSyntaxError {
  constructor(data: ChainmarkErrorData) {
    super(data);
    this.name = 'LexerError';
  }
}

/** Well-formed syntax describing an impossible tree shape */
export class StructuralError extends ChainmarkError {
  constructor(data: ChainmarkErrorData) {
    super(data);
    this.name = 'StructuralError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create the error for a message table entry.
 *
 * @example
 * createError('UNTERMINATED_GROUP', { open: '(', close: ')' }, token.span)
 * // MarkupSyntaxError: "Unclosed `(` at 1:5"
 */
export function createError(
  id: MessageId,
  context: Record<string, unknown>,
  span: SourceSpan
): ChainmarkError {
  const definition: MessageDefinition = MESSAGES[id];
  const data: ChainmarkErrorData = {
    message: renderMessage(definition.template, context),
    span,
    hint:
      definition.hint === undefined
        ? undefined
        : renderMessage(definition.hint, context),
  };

  switch (definition.category) {
    case 'lexer':
      return new LexerError(data);
    case 'syntax':
      return new MarkupSyntaxError(data);
    case 'structural':
      return new StructuralError(data);
  }
}
