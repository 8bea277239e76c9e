/**
 * CLI Shared Utilities
 * Diagnostic formatting and argument helpers for the chainmark CLI
 */

import { VERSION, type Diagnostic, type SourceSpan } from 'chainmark';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

/**
 * Format options for diagnostic output.
 */
export interface FormatOptions {
  readonly format: OutputFormat;
  /** Name shown in locations, `<stdin>` for piped input */
  readonly file: string;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/** Output streams, injectable so tests can capture them */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): string;
}

// ============================================================
// SOURCE SNIPPETS
// ============================================================

/**
 * Extract the lines around a span.
 *
 * @param contextLines - Lines shown before and after the span
 * @returns Empty for empty source or a span outside it
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SnippetLine[] {
  if (source === '') return [];

  const lines = source.split('\n');
  const totalLines = lines.length;
  if (span.start.line < 1 || span.start.line > totalLines) return [];

  const errorEndLine = Math.min(span.end.line, totalLines);
  const firstLine = Math.max(1, span.start.line - contextLines);
  const lastLine = Math.min(totalLines, errorEndLine + contextLines);

  const snippet: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippet.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '', // Convert 1-based to 0-based index
      isErrorLine: lineNum >= span.start.line && lineNum <= errorEndLine,
    });
  }
  return snippet;
}

/**
 * Render the caret underline for a span on its first line.
 *
 * - Single-char: single ^
 * - Multi-char same line: ^^^^^ (length = span width)
 * - Multi-line: ^^^^^ to the end of the first line
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;

  const padding = ' '.repeat(Math.max(0, startColumn - 1));
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));
  return padding + carets;
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostic in human-readable format.
 *
 * Output format:
 * ```
 * error: Expected `[` after attribute marker `@`
 *   --> view.rs:2:9
 *   |
 * 1 | let el = ui! {
 * 2 |     div @ { "x" }
 *   |         ^
 * 3 | };
 *   |
 *   = help: Attributes are written ...
 * ```
 */
function formatDiagnosticHuman(
  diagnostic: Diagnostic,
  source: string,
  file: string
): string {
  const { start } = diagnostic.span;
  const lines: string[] = [
    `error: ${diagnostic.message}`,
    `  --> ${file}:${start.line}:${start.column}`,
  ];

  const snippet = extractSnippet(source, diagnostic.span);
  if (snippet.length > 0) {
    const width = Math.max(...snippet.map((l) => String(l.lineNumber).length));
    const gutter = ' '.repeat(width);
    lines.push(`${gutter} |`);
    for (const line of snippet) {
      const lineNumStr = String(line.lineNumber).padStart(width, ' ');
      lines.push(`${lineNumStr} | ${line.content}`);
      if (line.lineNumber === start.line) {
        lines.push(
          `${gutter} | ${renderCaretUnderline(diagnostic.span, line.content)}`
        );
      }
    }
    lines.push(`${gutter} |`);
  }

  if (diagnostic.hint !== undefined) {
    lines.push(`  = help: ${diagnostic.hint}`);
  }

  return lines.join('\n');
}

/**
 * Format diagnostic in JSON format (LSP Diagnostic compatible).
 * LSP positions are 0-based.
 */
function toLspDiagnostic(diagnostic: Diagnostic): Record<string, unknown> {
  const { start, end } = diagnostic.span;
  const lsp: Record<string, unknown> = {
    severity: 1, // Error severity in LSP (1 = Error)
    message: diagnostic.message,
    range: {
      start: { line: start.line - 1, character: start.column - 1 },
      end: { line: end.line - 1, character: end.column - 1 },
    },
    source: 'chainmark',
  };
  if (diagnostic.hint !== undefined) {
    lsp['hint'] = diagnostic.hint;
  }
  return lsp;
}

/**
 * Format diagnostic in compact format (single line for CI).
 */
function formatDiagnosticCompact(diagnostic: Diagnostic, file: string): string {
  const { start } = diagnostic.span;
  return `${file}:${start.line}:${start.column}: ${diagnostic.message}`;
}

/**
 * Format all diagnostics of one input.
 *
 * - Human format: multi-line blocks with snippet and caret underline
 * - JSON format: one array of LSP diagnostics
 * - Compact format: one line per diagnostic
 */
export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  source: string,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(diagnostics.map(toLspDiagnostic), null, 2);
    case 'compact':
      return diagnostics
        .map((d) => formatDiagnosticCompact(d, options.file))
        .join('\n');
    case 'human':
      return diagnostics
        .map((d) => formatDiagnosticHuman(d, source, options.file))
        .join('\n\n');
  }
}

// ============================================================
// ERRORS AND FLAGS
// ============================================================

/**
 * Format a usage, configuration or file-system error for stderr.
 * ENOENT errors become "File not found: {path}".
 */
export function formatError(err: unknown): string {
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

export { VERSION };
