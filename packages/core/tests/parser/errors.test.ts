/**
 * Parser Tests: Errors
 * Every rejected form, with its message, position and error class
 */

import { describe, expect, it } from 'vitest';
import {
  ChainmarkError,
  MarkupSyntaxError,
  StructuralError,
} from '../../src/error-classes.js';
import { parseMarkup } from '../../src/parser/index.js';

function parseError(source: string): ChainmarkError {
  try {
    parseMarkup(source);
  } catch (err) {
    if (err instanceof ChainmarkError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
}

describe('parseMarkup errors', () => {
  describe('bodies', () => {
    it('rejects an empty markup body', () => {
      const err = parseError('   ');
      expect(err).toBeInstanceOf(MarkupSyntaxError);
      expect(err.toData().message).toBe('Empty markup body');
    });

    it('rejects a markup body holding only comments', () => {
      expect(parseError('// nothing here').toData().message).toBe('Empty markup body');
    });

    it('explains why a top-level expression needs braces', () => {
      const err = parseError('div');
      expect(err.message).toBe('Expected a body `{ ... }` after `div` at 1:1');
      expect(err.hint).toBe(
        'The braces are what mark a tree node; without them `div` is an ordinary expression. To pass an expression through unchanged, wrap it in parentheses: `(div)`'
      );
    });

    it('reports the whole top-level expression text', () => {
      const err = parseError('a + b');
      expect(err.toData().message).toBe('Expected a body `{ ... }` after `a + b`');
    });

    it('rejects a second root element', () => {
      const err = parseError('div {}, div {}');
      expect(err.message).toBe('Unexpected `,` after the root element at 1:7');
    });

    it('rejects empty braces in child position', () => {
      const err = parseError('div { "a", {} }');
      expect(err.message).toBe('Empty braces are not a child at 1:12');
    });

    it('rejects tokens after an element body', () => {
      const err = parseError('div { div {} "x" }');
      expect(err.message).toBe('Unexpected `"x"` after element body at 1:14');
    });

    it('rejects an empty child slot', () => {
      const err = parseError('div { "a",, "b" }');
      expect(err.message).toBe('Expected a child, found `,` at 1:11');
    });
  });

  describe('attributes', () => {
    it('explains a marker without brackets', () => {
      const err = parseError('div @ { "x" }');
      expect(err.message).toBe('Expected `[` after attribute marker `@` at 1:5');
      expect(err.hint).toContain('between the head and the body');
    });

    it('rejects a marker without a head', () => {
      const err = parseError('div { @[flex] {} }');
      expect(err.message).toBe(
        'Attribute marker `@` must follow an element head at 1:7'
      );
    });

    it('rejects an attribute list without a body', () => {
      const err = parseError('div { span @[flex] }');
      expect(err.message).toBe(
        'Expected a body `{ ... }` after the attribute list at 1:12'
      );
    });

    it('rejects an empty attribute list', () => {
      expect(parseError('div @[] {}').message).toBe('Empty attribute list at 1:5');
    });

    it('rejects a non-identifier attribute name', () => {
      expect(parseError('div @["flex"] {}').message).toBe(
        'Expected attribute name, found `"flex"` at 1:7'
      );
    });

    it('rejects a missing colon', () => {
      expect(parseError('div @[w px(1.0)] {}').message).toBe(
        'Expected `:` or `,` after attribute `w`, found `px` at 1:9'
      );
    });

    it('rejects a missing value', () => {
      expect(parseError('div @[w:] {}').message).toBe(
        'Missing value for attribute `w` at 1:7'
      );
    });

    it('rejects an empty argument', () => {
      expect(parseError('div @[when: (a,, b)] {}').message).toBe(
        'Expected an argument, found `,` at 1:16'
      );
    });
  });

  describe('delimiters', () => {
    it('reports an unclosed group at its opener', () => {
      const err = parseError('div { "a", f(1 }');
      expect(err.message).toBe('Expected `)` to close `(`, found `}` at 1:16');
    });

    it('reports an unclosed body', () => {
      const err = parseError('div { "a"');
      expect(err.message).toBe('Unclosed `{` at 1:5');
      expect(err.hint).toBe('Add the matching `}`');
    });

    it('rejects a stray closer', () => {
      expect(parseError('div {} )').message).toBe(
        'Unexpected `)` with no matching opening delimiter at 1:8'
      );
    });
  });

  describe('child forms', () => {
    it('rejects a spread without an expression', () => {
      expect(parseError('div { .. }').message).toBe(
        'Expected an expression after `..` at 1:7'
      );
    });

    it('rejects a three-dot spread and suggests two dots', () => {
      const err = parseError('div { ...items }');
      expect(err.message).toBe('Spread children take two dots, found `...` at 1:7');
      expect(err.hint).toBe('Write `..items`');
    });

    it('rejects a chain without a method name', () => {
      expect(parseError('div { .(x) }').message).toBe(
        'Expected a method name after `.`, found `(` at 1:8'
      );
    });

    it('rejects a lone dot', () => {
      expect(parseError('div { "a", . }').message).toBe(
        'Expected a method name after `.`, found `}` at 1:14'
      );
    });
  });

  describe('deferred', () => {
    it('rejects zero children', () => {
      const err = parseError('deferred {}');
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.message).toBe('`deferred` must have exactly one child, found 0 at 1:1');
    });

    it('rejects more than one child', () => {
      expect(parseError('deferred { a, b }').toData().message).toBe(
        '`deferred` must have exactly one child, found 2'
      );
    });

    it('rejects attributes', () => {
      const err = parseError('deferred @[flex] { a }');
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.message).toBe('`deferred` does not take attributes at 1:10');
    });

    it('rejects a spread child', () => {
      expect(parseError('deferred { ..items }').toData().message).toBe(
        '`deferred` child must be an element or an expression, found a spread'
      );
    });

    it('rejects a method chain child', () => {
      expect(parseError('div { deferred { .flex() } }').toData().message).toBe(
        '`deferred` child must be an element or an expression, found a method chain'
      );
    });
  });
});
