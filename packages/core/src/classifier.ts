/**
 * Head Classifier
 * Decides how an element's base expression is produced. Purely syntactic:
 * nothing here knows what the names refer to.
 */

import type { ExprRegion, HeadKind } from './ast-nodes.js';
import type { EmitConventions, MarkupConfig } from './config.js';
import { renderMessage } from './messages.js';
import { TOKEN_TYPES, type Token } from './token-types.js';

// ============================================================
// TYPES
// ============================================================

export type GenerationStrategy =
  | { readonly kind: 'construct'; readonly name: string }
  | { readonly kind: 'implicit-new'; readonly path: string }
  | { readonly kind: 'verbatim'; readonly expr: string };

/** Result of looking at head tokens: a regular head, or the reserved deferred tag */
export type HeadClass = HeadKind | { readonly kind: 'Deferred'; readonly tag: string };

// ============================================================
// HEAD SYNTAX
// ============================================================

/**
 * Segments of a bare path (`Header`, `ui::Header`), or null when the
 * tokens carry anything else. Member access such as `theme.Header` reads
 * a value, so it is not a path.
 */
function pathSegments(tokens: readonly Token[]): string[] | null {
  const segments: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) return null;
    if (i % 2 === 0) {
      if (token.type !== TOKEN_TYPES.IDENTIFIER) return null;
      segments.push(token.value);
    } else if (token.type !== TOKEN_TYPES.DOUBLE_COLON) {
      return null;
    }
  }
  // A trailing separator leaves an even token count
  return tokens.length % 2 === 1 ? segments : null;
}

/**
 * Classify the tokens of an element head.
 *
 * - one identifier equal to the deferred tag -> Deferred
 * - one identifier in the native tag list -> NativeTag
 * - a bare path whose last segment matches the component pattern -> Component
 * - anything else, calls and chains included -> Expression
 */
export function classifyHeadTokens(
  tokens: readonly Token[],
  expr: ExprRegion,
  config: MarkupConfig
): HeadClass {
  const segments = pathSegments(tokens);
  const span = expr.span;

  if (segments !== null && segments.length === 1) {
    const name = segments[0] ?? '';
    if (name === config.deferredTag) {
      return { kind: 'Deferred', tag: name };
    }
    if (config.nativeTags.includes(name)) {
      return { kind: 'NativeTag', name, span };
    }
  }

  const last = segments?.[segments.length - 1];
  if (last !== undefined && config.componentPattern.test(last)) {
    return {
      kind: 'Component',
      path: tokens.map((t) => t.value).join(''),
      span,
    };
  }

  return { kind: 'Expression', expr, span };
}

// ============================================================
// STRATEGY
// ============================================================

export function strategyFor(head: HeadKind): GenerationStrategy {
  switch (head.kind) {
    case 'NativeTag':
      return { kind: 'construct', name: head.name };
    case 'Component':
      return { kind: 'implicit-new', path: head.path };
    case 'Expression':
      return { kind: 'verbatim', expr: head.expr.text };
  }
}

/** Spell out the base expression a strategy starts from */
export function renderBase(
  strategy: GenerationStrategy,
  conventions: EmitConventions
): string {
  switch (strategy.kind) {
    case 'construct':
      return renderMessage(conventions.nativeConstructor, {
        name: strategy.name,
      });
    case 'implicit-new':
      return renderMessage(conventions.componentConstructor, {
        path: strategy.path,
      });
    case 'verbatim':
      return strategy.expr;
  }
}
