// ============================================================
// SOURCE LOCATION
// ============================================================

/** A position in the tokenized text. `line` and `column` are 1-based. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Span covering `first` through `last` */
export function joinSpans(first: SourceSpan, last: SourceSpan): SourceSpan {
  return { start: first.start, end: last.end };
}
