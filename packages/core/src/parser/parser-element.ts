/**
 * Parser Extension: Elements
 * Element heads, attribute markers, bodies and the deferred wrapper
 */

import { Parser } from './parser.js';
import type {
  AttributeNode,
  ChildNode,
  DeferredNode,
  MarkupNode,
} from '../ast-nodes.js';
import { classifyHeadTokens } from '../classifier.js';
import { createError } from '../error-classes.js';
import type { SourceSpan } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  assertAttributeListOpen,
  findHeadEnd,
  isHeadShaped,
} from './helpers.js';
import { matchingClose, regionOf, spanOf, tokenAt } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseElement(from: number, to: number): MarkupNode | null;
    buildDeferred(
      tag: string,
      attributesSpan: SourceSpan | null,
      children: readonly ChildNode[],
      span: SourceSpan
    ): DeferredNode;
  }
}

// ============================================================
// ELEMENT PARSING
// ============================================================

/**
 * Parse `[from, to)` as `head [@[attributes]] { children }`.
 *
 * Returns null when the range is not an element: there is no body, or the
 * tokens before the body are not head-shaped (closures and blocks such as
 * `|cx| { ... }` keep their braces as ordinary expressions).
 *
 * @throws MarkupSyntaxError when the range commits to an element and then
 *   breaks its shape
 */
Parser.prototype.parseElement = function (
  this: Parser,
  from: number,
  to: number
): MarkupNode | null {
  const stop = findHeadEnd(this.state, from, to);
  if (stop === to) return null;

  const marker = tokenAt(this.state, stop);
  const headShaped = isHeadShaped(this.state, from, stop);

  let attributes: AttributeNode[] = [];
  let attributesSpan: SourceSpan | null = null;
  let bodyOpen = stop;

  if (marker.type === TOKEN_TYPES.AT) {
    if (!headShaped) {
      throw createError('MISPLACED_ATTRIBUTE_MARKER', {}, marker.span);
    }
    const listOpen = assertAttributeListOpen(this.state, stop, to);
    const listClose = matchingClose(this.state, listOpen);
    attributesSpan = spanOf(this.state, stop, listClose);
    attributes = this.parseAttributes(listOpen + 1, listClose, attributesSpan);

    bodyOpen = listClose + 1;
    if (
      bodyOpen >= to ||
      tokenAt(this.state, bodyOpen).type !== TOKEN_TYPES.LBRACE
    ) {
      throw createError('ATTRIBUTES_WITHOUT_BODY', {}, attributesSpan);
    }
  } else if (!headShaped) {
    return null;
  }

  const bodyClose = matchingClose(this.state, bodyOpen);
  if (bodyClose + 1 < to) {
    const extra = tokenAt(this.state, bodyClose + 1);
    throw createError('UNEXPECTED_AFTER_BODY', { token: extra.value }, extra.span);
  }

  const span = spanOf(this.state, from, bodyClose);
  const head = classifyHeadTokens(
    this.state.tokens.slice(from, stop),
    regionOf(this.state, from, stop),
    this.state.config
  );
  const children = this.parseChildren(bodyOpen + 1, bodyClose);

  if (head.kind === 'Deferred') {
    return this.buildDeferred(head.tag, attributesSpan, children, span);
  }

  return { type: 'Element', head, attributes, children, span };
};

// ============================================================
// DEFERRED WRAPPER
// ============================================================

/**
 * The deferred tag wraps exactly one element or expression and takes no
 * attributes.
 *
 * @throws StructuralError when the wrapper breaks those rules
 */
Parser.prototype.buildDeferred = function (
  this: Parser,
  tag: string,
  attributesSpan: SourceSpan | null,
  children: readonly ChildNode[],
  span: SourceSpan
): DeferredNode {
  if (attributesSpan !== null) {
    throw createError('DEFERRED_ATTRIBUTES', { tag }, attributesSpan);
  }

  const [child] = children;
  if (child === undefined || children.length !== 1) {
    throw createError(
      'DEFERRED_CHILD_COUNT',
      { tag, count: children.length },
      span
    );
  }

  switch (child.type) {
    case 'Nested':
    case 'Literal':
      return { type: 'Deferred', tag, child, span };
    case 'Spread':
      throw createError(
        'DEFERRED_CHILD_KIND',
        { tag, kind: 'spread' },
        child.span
      );
    case 'MethodChainInsertion':
      throw createError(
        'DEFERRED_CHILD_KIND',
        { tag, kind: 'method chain' },
        child.span
      );
  }
};
