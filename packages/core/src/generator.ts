/**
 * Code Generator
 * Walks a markup tree and emits one chained call expression per element.
 */

import type {
  AttributeNode,
  ChildNode,
  DeferredNode,
  ElementNode,
  MarkupNode,
  MarkupRoot,
} from './ast-nodes.js';
import { renderBase, strategyFor } from './classifier.js';
import { DEFAULT_CONFIG, type EmitConventions, type MarkupConfig } from './config.js';
import { renderMessage } from './messages.js';

// ============================================================
// ENTRY POINT
// ============================================================

/**
 * Generate the expression for a parsed markup body.
 *
 * @example
 * generate(parseMarkup('div @[flex] { "Hi", ..rows }'))
 * // 'div().flex().child("Hi").children(rows)'
 */
export function generate(
  root: MarkupRoot,
  config: MarkupConfig = DEFAULT_CONFIG
): string {
  const body = root.body;
  if (body.type === 'Passthrough') {
    return body.expr.text;
  }
  return generateNode(body, config.conventions);
}

export function generateNode(
  node: MarkupNode,
  conventions: EmitConventions
): string {
  switch (node.type) {
    case 'Element':
      return generateElement(node, conventions);
    case 'Deferred':
      return generateDeferred(node, conventions);
  }
}

// ============================================================
// ELEMENTS
// ============================================================

function generateElement(
  element: ElementNode,
  conventions: EmitConventions
): string {
  let code = renderBase(strategyFor(element.head), conventions);
  for (const attribute of element.attributes) {
    code += generateAttribute(attribute);
  }
  for (const child of element.children) {
    code += generateChild(child, conventions);
  }
  return code;
}

function generateAttribute(attribute: AttributeNode): string {
  switch (attribute.type) {
    case 'Flag':
      return `.${attribute.name}()`;
    case 'KeyValue':
      return `.${attribute.name}(${attribute.value.text})`;
    case 'KeyMultiValue':
      return `.${attribute.name}(${attribute.values.map((v) => v.text).join(', ')})`;
  }
}

/** Text appended to the running expression for one child */
function generateChild(child: ChildNode, conventions: EmitConventions): string {
  switch (child.type) {
    case 'Literal':
      return `.${conventions.attachOne}(${child.expr.text})`;
    case 'Spread':
      return `.${conventions.attachMany}(${child.expr.text})`;
    case 'Nested':
      return `.${conventions.attachOne}(${generateNode(child.element, conventions)})`;
    case 'MethodChainInsertion':
      return child.chain.text;
  }
}

// ============================================================
// DEFERRED WRAPPER
// ============================================================

function generateDeferred(
  node: DeferredNode,
  conventions: EmitConventions
): string {
  const inner =
    node.child.type === 'Nested'
      ? generateNode(node.child.element, conventions)
      : node.child.expr.text;
  const erased = renderMessage(conventions.erase, { expr: inner });
  return renderMessage(conventions.defer, { expr: erased });
}
