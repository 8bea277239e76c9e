/**
 * Parser Tests: Markup Structure
 * Root forms, heads, attributes and children
 */

import { describe, expect, it } from 'vitest';
import type {
  ChildNode,
  ElementNode,
  MarkupNode,
  MarkupRoot,
} from '../../src/ast-nodes.js';
import { parseMarkup } from '../../src/parser/index.js';

function rootElement(source: string): ElementNode {
  const root = parseMarkup(source);
  if (root.body.type !== 'Element') {
    throw new Error(`expected an element, got ${root.body.type}`);
  }
  return root.body;
}

function nestedElement(child: ChildNode | undefined): MarkupNode {
  if (child?.type !== 'Nested') {
    throw new Error(`expected a nested child, got ${child?.type}`);
  }
  return child.element;
}

describe('parseMarkup', () => {
  describe('root', () => {
    it('parses an element without children', () => {
      const el = rootElement('div {}');
      expect(el.head).toMatchObject({ kind: 'NativeTag', name: 'div' });
      expect(el.attributes).toEqual([]);
      expect(el.children).toEqual([]);
    });

    it('passes a parenthesized expression through', () => {
      const root: MarkupRoot = parseMarkup('(render_row(cx, 1))');
      expect(root.body.type).toBe('Passthrough');
      if (root.body.type === 'Passthrough') {
        expect(root.body.expr.text).toBe('(render_row(cx, 1))');
      }
    });

    it('treats a parenthesized group followed by more syntax as a head', () => {
      const el = rootElement('(make)() {}');
      expect(el.head).toMatchObject({ kind: 'Expression' });
      if (el.head.kind === 'Expression') {
        expect(el.head.expr.text).toBe('(make)()');
      }
    });

    it('records the span of the whole element', () => {
      const el = rootElement('  div { "x" }  ');
      expect(el.span.start).toEqual({ line: 1, column: 3, offset: 2 });
      expect(el.span.end).toEqual({ line: 1, column: 14, offset: 13 });
    });

    it('skips comments between items', () => {
      const el = rootElement('div { // first\n "a", /* second */ "b" }');
      expect(el.children.map((c) => c.type)).toEqual(['Literal', 'Literal']);
    });
  });

  describe('heads', () => {
    it('classifies allow-listed tags as native', () => {
      expect(rootElement('svg {}').head).toMatchObject({
        kind: 'NativeTag',
        name: 'svg',
      });
    });

    it('classifies uppercase paths as components', () => {
      expect(rootElement('Header {}').head).toMatchObject({
        kind: 'Component',
        path: 'Header',
      });
      expect(rootElement('ui::widgets::Header {}').head).toMatchObject({
        kind: 'Component',
        path: 'ui::widgets::Header',
      });
    });

    it('keeps calls on a component path as expressions', () => {
      const el = rootElement('Header::with_label("x") {}');
      expect(el.head.kind).toBe('Expression');
      if (el.head.kind === 'Expression') {
        expect(el.head.expr.text).toBe('Header::with_label("x")');
      }
    });

    it('keeps lowercase names outside the allow-list as expressions', () => {
      expect(rootElement('span {}').head.kind).toBe('Expression');
    });

    it('accepts builder chains, macro calls and generics as heads', () => {
      for (const head of [
        'self.row(ix).gap(px(2.0))',
        'format!("{}", n)',
        'List::<Item>::new()',
        'make_list<Item>()',
        'items[0]',
        'maybe?.value',
      ]) {
        const el = rootElement(`${head} { "x" }`);
        expect(el.head.kind).toBe('Expression');
        if (el.head.kind === 'Expression') {
          expect(el.head.expr.text).toBe(head);
        }
      }
    });
  });

  describe('attributes', () => {
    it('parses flags in order', () => {
      const el = rootElement('div @[flex, flex_col] {}');
      expect(el.attributes.map((a) => [a.type, a.name])).toEqual([
        ['Flag', 'flex'],
        ['Flag', 'flex_col'],
      ]);
    });

    it('parses key-value attributes with nested commas', () => {
      const el = rootElement('div @[w: px(200.0), on_click: f(a, b)] {}');
      const [w, onClick] = el.attributes;
      expect(w).toMatchObject({ type: 'KeyValue', name: 'w' });
      expect(onClick).toMatchObject({ type: 'KeyValue', name: 'on_click' });
      if (w?.type === 'KeyValue' && onClick?.type === 'KeyValue') {
        expect(w.value.text).toBe('px(200.0)');
        expect(onClick.value.text).toBe('f(a, b)');
      }
    });

    it('splits a parenthesized group with a top-level comma into arguments', () => {
      const el = rootElement('div @[when: (visible, |d| d.flex())] {}');
      const [when] = el.attributes;
      expect(when?.type).toBe('KeyMultiValue');
      if (when?.type === 'KeyMultiValue') {
        expect(when.values.map((v) => v.text)).toEqual(['visible', '|d| d.flex()']);
      }
    });

    it('keeps a single parenthesized expression as one value', () => {
      const el = rootElement('div @[w: (a + b)] {}');
      const [w] = el.attributes;
      expect(w?.type).toBe('KeyValue');
      if (w?.type === 'KeyValue') {
        expect(w.value.text).toBe('(a + b)');
      }
    });

    it('treats empty parentheses and a trailing comma as argument lists', () => {
      const el = rootElement('div @[reset: (), one: (a,)] {}');
      const [reset, one] = el.attributes;
      expect(reset).toMatchObject({ type: 'KeyMultiValue', values: [] });
      if (one?.type === 'KeyMultiValue') {
        expect(one.values.map((v) => v.text)).toEqual(['a']);
      } else {
        throw new Error('expected a multi-value attribute');
      }
    });

    it('allows a trailing comma and duplicate names', () => {
      const el = rootElement('div @[p: px(1.0), p: px(2.0),] {}');
      expect(el.attributes.map((a) => a.name)).toEqual(['p', 'p']);
    });

    it('keeps closure parameters together in a value', () => {
      const el = rootElement(
        'div @[on_click: |event, cx| handle(event), on_hover: move |a, b| a | b] {}'
      );
      const values = el.attributes.map((a) =>
        a.type === 'KeyValue' ? a.value.text : a.type
      );
      expect(values).toEqual(['|event, cx| handle(event)', 'move |a, b| a | b']);
    });

    it('keeps closure parameters together in an argument group', () => {
      const el = rootElement('div @[when: (open, |d, cx| d.flex())] {}');
      const [when] = el.attributes;
      if (when?.type !== 'KeyMultiValue') {
        throw new Error('expected a multi-value attribute');
      }
      expect(when.values.map((v) => v.text)).toEqual(['open', '|d, cx| d.flex()']);
    });

    it('keeps commas inside turbofish type arguments', () => {
      const el = rootElement('div @[map: convert::<A, B>(x)] {}');
      const [map] = el.attributes;
      if (map?.type !== 'KeyValue') throw new Error('expected a key-value attribute');
      expect(map.value.text).toBe('convert::<A, B>(x)');
    });
  });

  describe('children', () => {
    it('parses literal children in order', () => {
      const el = rootElement('div { "First", "Second" }');
      expect(
        el.children.map((c) => (c.type === 'Literal' ? c.expr.text : c.type))
      ).toEqual(['"First"', '"Second"']);
    });

    it('parses spread children', () => {
      const el = rootElement('div { ..items.iter().map(render) }');
      const [spread] = el.children;
      expect(spread?.type).toBe('Spread');
      if (spread?.type === 'Spread') {
        expect(spread.expr.text).toBe('items.iter().map(render)');
      }
    });

    it('captures method chains as one region', () => {
      const el = rootElement(
        'div { "a", .when(open, |d| d.child("b")).map::<Div, _>(|d| d), "c" }'
      );
      const types = el.children.map((c) => c.type);
      expect(types).toEqual(['Literal', 'MethodChainInsertion', 'Literal']);
      const chain = el.children[1];
      if (chain?.type === 'MethodChainInsertion') {
        expect(chain.chain.text).toBe(
          '.when(open, |d| d.child("b")).map::<Div, _>(|d| d)'
        );
      }
    });

    it('keeps commas inside generic calls after a name', () => {
      const el = rootElement('div { .pipe<A, B>(f), "x" }');
      expect(el.children).toHaveLength(2);
      const chain = el.children[0];
      if (chain?.type === 'MethodChainInsertion') {
        expect(chain.chain.text).toBe('.pipe<A, B>(f)');
      }
    });

    it('splits comparisons at the comma', () => {
      const el = rootElement('div { a < b, c > d }');
      expect(
        el.children.map((c) => (c.type === 'Literal' ? c.expr.text : c.type))
      ).toEqual(['a < b', 'c > d']);
    });

    it('parses nested elements recursively', () => {
      const el = rootElement('div { div @[flex] { Label {} } }');
      const inner = nestedElement(el.children[0]);
      expect(inner.type).toBe('Element');
      if (inner.type === 'Element') {
        expect(inner.attributes).toHaveLength(1);
        const label = nestedElement(inner.children[0]);
        expect(label).toMatchObject({
          type: 'Element',
          head: { kind: 'Component', path: 'Label' },
        });
      }
    });

    it('leaves closures and object literals as literal children', () => {
      const el = rootElement('div { |cx| { cx.render() }, { a: 1 } }');
      expect(
        el.children.map((c) => (c.type === 'Literal' ? c.expr.text : c.type))
      ).toEqual(['|cx| { cx.render() }', '{ a: 1 }']);
    });

    it('splits children after closures with several parameters', () => {
      const el = rootElement('div { |ix, cx| row(ix, cx), x | y, "z" }');
      expect(
        el.children.map((c) => (c.type === 'Literal' ? c.expr.text : c.type))
      ).toEqual(['|ix, cx| row(ix, cx)', 'x | y', '"z"']);
    });

    it('keeps the exact text of multi-line expressions', () => {
      const el = rootElement('div {\n  f(\n    a,\n    b\n  )\n}');
      const [child] = el.children;
      if (child?.type !== 'Literal') throw new Error('expected a literal');
      expect(child.expr.text).toBe('f(\n    a,\n    b\n  )');
    });

    it('allows a trailing comma', () => {
      expect(rootElement('div { "a", }').children).toHaveLength(1);
    });
  });

  describe('deferred', () => {
    it('wraps a single nested element', () => {
      const root = parseMarkup('deferred { div { "x" } }');
      expect(root.body.type).toBe('Deferred');
      if (root.body.type === 'Deferred') {
        expect(root.body.tag).toBe('deferred');
        expect(root.body.child.type).toBe('Nested');
      }
    });

    it('wraps a single expression', () => {
      const root = parseMarkup('deferred { popover }');
      if (root.body.type !== 'Deferred') throw new Error('expected deferred');
      expect(root.body.child).toMatchObject({
        type: 'Literal',
        expr: { text: 'popover' },
      });
    });
  });
});
