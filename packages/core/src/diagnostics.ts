/**
 * Diagnostics Emitter
 * Turns transformer failures into positioned messages.
 */

import { ChainmarkError, StructuralError } from './error-classes.js';
import type { SourceSpan } from './source-location.js';

export type DiagnosticKind = 'syntax' | 'structural';

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly span: SourceSpan;
  readonly hint?: string | undefined;
}

/**
 * Convert a thrown value into a diagnostic.
 * Anything that is not a ChainmarkError is a defect and is rethrown.
 */
export function toDiagnostic(err: unknown): Diagnostic {
  if (!(err instanceof ChainmarkError)) {
    throw err;
  }
  const data = err.toData();
  return {
    kind: err instanceof StructuralError ? 'structural' : 'syntax',
    message: data.message,
    span: data.span,
    hint: data.hint,
  };
}
