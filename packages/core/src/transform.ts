/**
 * Source Transformer
 * Transforms one markup body, or every markup invocation in a host file.
 */

import { DEFAULT_CONFIG, type MarkupConfig } from './config.js';
import { toDiagnostic, type Diagnostic } from './diagnostics.js';
import { createError } from './error-classes.js';
import { generate } from './generator.js';
import { tokenize } from './lexer/index.js';
import { parseMarkup, parseTokens } from './parser/index.js';
import type { SourceSpan } from './source-location.js';
import { TOKEN_TYPES, type Token } from './token-types.js';

// ============================================================
// TYPES
// ============================================================

export interface TransformOptions {
  config?: MarkupConfig | undefined;
}

export interface SourceTransformOptions extends TransformOptions {
  /** Name before `!` that introduces a markup block (default: "ui") */
  macroName?: string | undefined;
}

export type MarkupResult =
  | { readonly ok: true; readonly code: string }
  | { readonly ok: false; readonly diagnostic: Diagnostic };

export interface SourceTransformResult {
  /** The host text with every successful block replaced */
  readonly code: string;
  /** One entry per failed block, in source order */
  readonly diagnostics: readonly Diagnostic[];
  /** Number of markup blocks found */
  readonly blocks: number;
}

interface Replacement {
  readonly start: number;
  readonly end: number;
  readonly code: string;
}

// ============================================================
// SINGLE BODY
// ============================================================

/**
 * Transform the contents of one markup block.
 *
 * @example
 * transformMarkup('div { "Hello" }')
 * // { ok: true, code: 'div().child("Hello")' }
 */
export function transformMarkup(
  body: string,
  options: TransformOptions = {}
): MarkupResult {
  const config = options.config ?? DEFAULT_CONFIG;
  try {
    const root = parseMarkup(body, { config });
    return { ok: true, code: generate(root, config) };
  } catch (err) {
    return { ok: false, diagnostic: toDiagnostic(err) };
  }
}

// ============================================================
// HOST FILES
// ============================================================

function isBlockStart(tokens: readonly Token[], i: number, macroName: string): boolean {
  const name = tokens[i];
  const bang = tokens[i + 1];
  const open = tokens[i + 2];
  return (
    name?.type === TOKEN_TYPES.IDENTIFIER &&
    name.value === macroName &&
    bang?.type === TOKEN_TYPES.OPERATOR &&
    bang.value === '!' &&
    open?.type === TOKEN_TYPES.LBRACE
  );
}

/** Index of the `}` closing the `{` at `open`, or -1 */
function findBlockClose(tokens: readonly Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    const type = tokens[i]?.type;
    if (type === TOKEN_TYPES.LBRACE) depth++;
    if (type === TOKEN_TYPES.RBRACE) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Body tokens of a block, terminated by an EOF placed at the closing brace */
function blockTokens(tokens: readonly Token[], open: number, close: number): Token[] {
  const body = tokens.slice(open + 1, close);
  const closer = tokens[close];
  if (closer !== undefined) {
    const at = closer.span.start;
    body.push({ type: TOKEN_TYPES.EOF, value: '', span: { start: at, end: at } });
  }
  return body;
}

function applyReplacements(text: string, replacements: readonly Replacement[]): string {
  let code = '';
  let last = 0;
  for (const { start, end, code: generated } of replacements) {
    code += text.slice(last, start) + generated;
    last = end;
  }
  return code + text.slice(last);
}

/**
 * Replace every `<macroName>! { ... }` block in `text` with its generated
 * expression. Blocks are independent: a failed block stays as written and
 * adds one diagnostic. Spans point into `text`.
 */
export function transformSource(
  text: string,
  options: SourceTransformOptions = {}
): SourceTransformResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const macroName = options.macroName ?? 'ui';

  let tokens: Token[];
  try {
    tokens = tokenize(text);
  } catch (err) {
    return { code: text, diagnostics: [toDiagnostic(err)], blocks: 0 };
  }

  const replacements: Replacement[] = [];
  const diagnostics: Diagnostic[] = [];
  let blocks = 0;

  for (let i = 0; i < tokens.length; i++) {
    if (!isBlockStart(tokens, i, macroName)) continue;

    const open = i + 2;
    const close = findBlockClose(tokens, open);
    const start = tokens[i];
    const end = tokens[close];
    blocks++;

    if (start === undefined || end === undefined) {
      const brace = tokens[open];
      if (brace !== undefined) {
        diagnostics.push(unclosedBlock(brace.span));
      }
      break;
    }

    try {
      const root = parseTokens(blockTokens(tokens, open, close), text, { config });
      replacements.push({
        start: start.span.start.offset,
        end: end.span.end.offset,
        code: generate(root, config),
      });
    } catch (err) {
      diagnostics.push(toDiagnostic(err));
    }
    i = close;
  }

  return { code: applyReplacements(text, replacements), diagnostics, blocks };
}

function unclosedBlock(span: SourceSpan): Diagnostic {
  return toDiagnostic(createError('UNTERMINATED_GROUP', { open: '{', close: '}' }, span));
}
