/**
 * Code Generator Tests
 * Emitted call chains for parsed markup
 */

import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../../src/config.js';
import { generate } from '../../src/generator.js';
import { parseMarkup } from '../../src/parser/index.js';

function emit(source: string): string {
  return generate(parseMarkup(source));
}

describe('generate', () => {
  describe('scenarios', () => {
    it('emits only the constructor for an empty native element', () => {
      expect(emit('div {}')).toBe('div()');
    });

    it('chains flags in order', () => {
      expect(emit('div @[flex, flex_col] {}')).toBe('div().flex().flex_col()');
    });

    it('attaches literal children one at a time', () => {
      expect(emit('div { "First", "Second" }')).toBe(
        'div().child("First").child("Second")'
      );
    });

    it('attaches a spread in one call', () => {
      expect(emit('div { ..items }')).toBe('div().children(items)');
    });

    it('erases and wraps the deferred child', () => {
      expect(emit('deferred { div { "x" } }')).toBe(
        'deferred((div().child("x")).into_any_element())'
      );
    });

    it('constructs components and keeps expression heads', () => {
      expect(emit('Header {}')).toBe('Header::new()');
      expect(emit('Header::with_label("x") {}')).toBe('Header::with_label("x")');
    });
  });

  describe('attributes', () => {
    it('emits key-value and multi-value calls', () => {
      expect(
        emit('div @[w: px(200.0), when: (open, |d| d.flex())] {}')
      ).toBe('div().w(px(200.0)).when(open, |d| d.flex())');
    });

    it('emits an empty argument list', () => {
      expect(emit('div @[reset: ()] {}')).toBe('div().reset()');
    });

    it('keeps closures with several parameters whole', () => {
      expect(emit('div @[on_click: |event, cx| handle(event, cx)] {}')).toBe(
        'div().on_click(|event, cx| handle(event, cx))'
      );
      expect(emit('div @[on_drop: move |item, cx| drop_in(item), flex] {}')).toBe(
        'div().on_drop(move |item, cx| drop_in(item)).flex()'
      );
      expect(emit('div @[when: (open, |d, cx| d.flex())] {}')).toBe(
        'div().when(open, |d, cx| d.flex())'
      );
    });

    it('keeps a grouped single value in parentheses', () => {
      expect(emit('div @[w: (a + b)] {}')).toBe('div().w((a + b))');
    });

    it('puts attributes before children', () => {
      expect(emit('div @[flex] { "a" }')).toBe('div().flex().child("a")');
    });
  });

  describe('children', () => {
    it('generates nested elements before attaching them', () => {
      expect(emit('div { div @[flex] { Label {} }, "tail" }')).toBe(
        'div().child(div().flex().child(Label::new())).child("tail")'
      );
    });

    it('splices method chains between siblings', () => {
      expect(emit('div { "a", .when(open, |d| d.child("b")), "c" }')).toBe(
        'div().child("a").when(open, |d| d.child("b")).child("c")'
      );
    });

    it('attaches component and expression heads the same way', () => {
      expect(emit('Panel { Header {}, (footer(cx)) }')).toBe(
        'Panel::new().child(Header::new()).child((footer(cx)))'
      );
    });

    it('keeps expression text exactly as written', () => {
      expect(emit('div { f(a,\n  b) }')).toBe('div().child(f(a,\n  b))');
    });

    it('attaches closure children with several parameters as one child', () => {
      expect(emit('div { |ix, cx| row(ix, cx), move |a, b| a + b }')).toBe(
        'div().child(|ix, cx| row(ix, cx)).child(move |a, b| a + b)'
      );
    });

    it('keeps lifetimes inside chains and values', () => {
      expect(emit("div { .map(|s: &'static str| s), label::<'_>(x) }")).toBe(
        "div().map(|s: &'static str| s).child(label::<'_>(x))"
      );
    });

    it('wraps a deferred expression child', () => {
      expect(emit('div { deferred { menu } }')).toBe(
        'div().child(deferred((menu).into_any_element()))'
      );
    });
  });

  describe('root forms', () => {
    it('emits a passthrough as written', () => {
      expect(emit('(render(cx))')).toBe('(render(cx))');
    });
  });

  describe('properties', () => {
    it('is deterministic', () => {
      const root = parseMarkup('div @[flex] { "a", ..b, .c(), d {} }');
      expect(generate(root)).toBe(generate(root));
    });

    it('changes only call order when attributes are permuted', () => {
      expect(emit('div @[a, b: 1] {}')).toBe('div().a().b(1)');
      expect(emit('div @[b: 1, a] {}')).toBe('div().b(1).a()');
    });

    it('changes only attach order when children are permuted', () => {
      expect(emit('div { x, ..ys }')).toBe('div().child(x).children(ys)');
      expect(emit('div { ..ys, x }')).toBe('div().children(ys).child(x)');
    });

    it('emits exactly the base expression for every head kind', () => {
      expect(emit('canvas {}')).toBe('canvas()');
      expect(emit('ui::Card {}')).toBe('ui::Card::new()');
      expect(emit('self.card() {}')).toBe('self.card()');
      expect(emit('theme.Header {}')).toBe('theme.Header');
    });
  });

  describe('configuration', () => {
    it('classifies every head the same way with a global pattern', () => {
      const config = resolveConfig({ componentPattern: /^[A-Z]/g });
      const root = parseMarkup('Header { Footer {}, Footer {} }', { config });
      expect(generate(root, config)).toBe(
        'Header::new().child(Footer::new()).child(Footer::new())'
      );
    });
  });

  describe('conventions', () => {
    it('uses configured constructors and attach methods', () => {
      const config = resolveConfig({
        nativeTags: ['view'],
        conventions: {
          nativeConstructor: "h('{name}')",
          componentConstructor: 'new {path}()',
          attachOne: 'append',
          attachMany: 'appendAll',
          erase: '{expr}.erase()',
          defer: 'lazy({expr})',
        },
      });
      const root = parseMarkup('view { Card {}, ..rows, deferred { x } }', { config });
      expect(generate(root, config)).toBe(
        "h('view').append(new Card()).appendAll(rows).append(lazy(x.erase()))"
      );
    });
  });
});
