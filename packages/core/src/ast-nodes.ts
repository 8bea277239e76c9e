/**
 * chainmark AST Types
 *
 * Grammar:
 *   markup     = element | "(" expr ")"
 *   element    = head [ "@[" attribute { "," attribute } [","] "]" ] "{" [ child { "," child } [","] ] "}"
 *   attribute  = name | name ":" expr | name ":" "(" expr { "," expr } [","] ")"
 *   child      = ".." expr | "." chain | element | expr
 */

import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// EXPRESSION REGIONS
// ============================================================

/**
 * Host-language expression kept as opaque text.
 * `text` is sliced verbatim from the source, from the first token of
 * the region to the last.
 */
export interface ExprRegion extends BaseNode {
  readonly text: string;
}

// ============================================================
// HEADS
// ============================================================

/** Allow-listed tag name: `div` */
export interface NativeTagHead extends BaseNode {
  readonly kind: 'NativeTag';
  readonly name: string;
}

/** Bare path whose last segment looks like a type name: `Header`, `ui::Header` */
export interface ComponentHead extends BaseNode {
  readonly kind: 'Component';
  readonly path: string;
}

/** Anything else, used as the base value unchanged: `Header::with_label("x")` */
export interface ExpressionHead extends BaseNode {
  readonly kind: 'Expression';
  readonly expr: ExprRegion;
}

export type HeadKind = NativeTagHead | ComponentHead | ExpressionHead;

// ============================================================
// ATTRIBUTES
// ============================================================

/** `flex` -> `.flex()` */
export interface FlagAttribute extends BaseNode {
  readonly type: 'Flag';
  readonly name: string;
}

/** `w: px(200.0)` -> `.w(px(200.0))` */
export interface KeyValueAttribute extends BaseNode {
  readonly type: 'KeyValue';
  readonly name: string;
  readonly value: ExprRegion;
}

/**
 * `when: (visible, |d| d.flex())` -> `.when(visible, |d| d.flex())`
 * The parentheses group call arguments; they are not a tuple value.
 */
export interface KeyMultiValueAttribute extends BaseNode {
  readonly type: 'KeyMultiValue';
  readonly name: string;
  readonly values: readonly ExprRegion[];
}

export type AttributeNode =
  | FlagAttribute
  | KeyValueAttribute
  | KeyMultiValueAttribute;

// ============================================================
// CHILDREN
// ============================================================

/** Any expression attached as one child: `"Hello"`, `(Header::new())` */
export interface LiteralChild extends BaseNode {
  readonly type: 'Literal';
  readonly expr: ExprRegion;
}

/** `..items` attaches a whole iterable in one call */
export interface SpreadChild extends BaseNode {
  readonly type: 'Spread';
  readonly expr: ExprRegion;
}

/** Nested markup, generated first and then attached */
export interface NestedChild extends BaseNode {
  readonly type: 'Nested';
  readonly element: MarkupNode;
}

/**
 * `.when(cond, |d| d.child("x"))` spliced onto the running expression.
 * `chain.text` starts with the leading dot.
 */
export interface MethodChainInsertion extends BaseNode {
  readonly type: 'MethodChainInsertion';
  readonly chain: ExprRegion;
}

export type ChildNode =
  | LiteralChild
  | SpreadChild
  | NestedChild
  | MethodChainInsertion;

// ============================================================
// ELEMENTS
// ============================================================

export interface ElementNode extends BaseNode {
  readonly type: 'Element';
  readonly head: HeadKind;
  readonly attributes: readonly AttributeNode[];
  readonly children: readonly ChildNode[];
}

/** The reserved single-child wrapper: `deferred { div { "x" } }` */
export interface DeferredNode extends BaseNode {
  readonly type: 'Deferred';
  readonly tag: string;
  readonly child: NestedChild | LiteralChild;
}

export type MarkupNode = ElementNode | DeferredNode;

// ============================================================
// ROOT
// ============================================================

/** Top-level `(expr)`, emitted exactly as written */
export interface PassthroughNode extends BaseNode {
  readonly type: 'Passthrough';
  readonly expr: ExprRegion;
}

export interface MarkupRoot extends BaseNode {
  readonly type: 'Markup';
  readonly body: MarkupNode | PassthroughNode;
}
