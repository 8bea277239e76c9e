/**
 * Diagnostic Message Table
 * Every failure the transformer can report, with its category and wording.
 */

// ============================================================
// CATEGORIES
// ============================================================

/** Which error class a message is raised as */
export type MessageCategory = 'lexer' | 'syntax' | 'structural';

/** Table entry for a single failure */
export interface MessageDefinition {
  readonly category: MessageCategory;
  /** Message template with {placeholder} syntax */
  readonly template: string;
  /** Optional follow-up explaining how to fix the input */
  readonly hint?: string | undefined;
}

// ============================================================
// MESSAGE TABLE
// ============================================================

export const MESSAGES = {
  // Token source
  UNTERMINATED_STRING: {
    category: 'lexer',
    template: 'Unterminated string literal',
    hint: 'Close the string with a matching {quote}',
  },
  UNTERMINATED_TEMPLATE: {
    category: 'lexer',
    template: 'Unterminated template literal',
    hint: 'Close the template literal with a backtick',
  },
  UNTERMINATED_COMMENT: {
    category: 'lexer',
    template: 'Unterminated block comment',
    hint: 'Close the comment with */',
  },
  UNEXPECTED_CHARACTER: {
    category: 'lexer',
    template: 'Unexpected character {char}',
  },

  // Bodies
  EMPTY_MARKUP: {
    category: 'syntax',
    template: 'Empty markup body',
    hint: 'There is no implicit empty element; write the element out, for example `div {}`',
  },
  EMPTY_BRACES_CHILD: {
    category: 'syntax',
    template: 'Empty braces are not a child',
    hint: 'Braces only make an element when a head comes before them, as in `div {}`; remove them, and use // for comments',
  },
  MISSING_BODY: {
    category: 'syntax',
    template: 'Expected a body `{ ... }` after `{head}`',
    hint: 'The braces are what mark a tree node; without them `{head}` is an ordinary expression. To pass an expression through unchanged, wrap it in parentheses: `({head})`',
  },
  UNEXPECTED_AFTER_ROOT: {
    category: 'syntax',
    template: 'Unexpected `{token}` after the root element',
    hint: 'Markup has exactly one root element; put siblings inside a parent such as `div { ... }`',
  },
  UNEXPECTED_AFTER_BODY: {
    category: 'syntax',
    template: 'Unexpected `{token}` after element body',
    hint: 'Separate children with commas',
  },
  EMPTY_CHILD: {
    category: 'syntax',
    template: 'Expected a child, found `{token}`',
    hint: 'Remove the extra comma',
  },

  // Attributes
  STRAY_ATTRIBUTE_MARKER: {
    category: 'syntax',
    template: 'Expected `[` after attribute marker `@`',
    hint: 'Attributes are written `@[flex, w: px(200.0)]` between the head and the body; the brackets are what separate them from the head expression',
  },
  MISPLACED_ATTRIBUTE_MARKER: {
    category: 'syntax',
    template: 'Attribute marker `@` must follow an element head',
    hint: 'Only an element head such as `div` or `Header` can take attributes, for example `div @[flex] {}`',
  },
  ATTRIBUTES_WITHOUT_BODY: {
    category: 'syntax',
    template: 'Expected a body `{ ... }` after the attribute list',
    hint: 'Attributes belong to elements, and an element is marked by its braces; add `{}` for an element without children',
  },
  EMPTY_ATTRIBUTES: {
    category: 'syntax',
    template: 'Empty attribute list',
    hint: 'Remove `@[]` or add attributes',
  },
  EXPECTED_ATTRIBUTE_NAME: {
    category: 'syntax',
    template: 'Expected attribute name, found `{token}`',
  },
  EXPECTED_ATTRIBUTE_COLON: {
    category: 'syntax',
    template: 'Expected `:` or `,` after attribute `{name}`, found `{token}`',
  },
  MISSING_ATTRIBUTE_VALUE: {
    category: 'syntax',
    template: 'Missing value for attribute `{name}`',
  },
  EMPTY_ARGUMENT: {
    category: 'syntax',
    template: 'Expected an argument, found `{token}`',
    hint: 'Remove the extra comma',
  },

  // Delimiters
  UNTERMINATED_GROUP: {
    category: 'syntax',
    template: 'Unclosed `{open}`',
    hint: 'Add the matching `{close}`',
  },
  MISMATCHED_DELIMITER: {
    category: 'syntax',
    template: 'Expected `{expected}` to close `{open}`, found `{found}`',
  },
  UNEXPECTED_CLOSER: {
    category: 'syntax',
    template: 'Unexpected `{token}` with no matching opening delimiter',
  },

  // Child forms
  MALFORMED_SPREAD: {
    category: 'syntax',
    template: 'Expected an expression after `..`',
    hint: 'Spread children are written `..items`',
  },
  THREE_DOT_SPREAD: {
    category: 'syntax',
    template: 'Spread children take two dots, found `...`',
    hint: 'Write `..{expr}`',
  },
  MALFORMED_CHAIN: {
    category: 'syntax',
    template: 'Expected a method name after `.`, found `{token}`',
    hint: 'Method chains are written `.name(args)`',
  },

  // Structure
  DEFERRED_CHILD_COUNT: {
    category: 'structural',
    template: '`{tag}` must have exactly one child, found {count}',
  },
  DEFERRED_ATTRIBUTES: {
    category: 'structural',
    template: '`{tag}` does not take attributes',
  },
  DEFERRED_CHILD_KIND: {
    category: 'structural',
    template: '`{tag}` child must be an element or an expression, found a {kind}',
  },
} as const satisfies Record<string, MessageDefinition>;

export type MessageId = keyof typeof MESSAGES;

// ============================================================
// TEMPLATE RENDERING
// ============================================================

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `{name}` placeholders with values from `context`.
 * Placeholders without a value, and braces that are not placeholders,
 * are kept as written.
 *
 * @example
 * renderMessage('Unclosed `{open}`', { open: '(' })
 * // "Unclosed `(`"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(PLACEHOLDER, (whole, name: string) => {
    const value = context[name];
    return value === undefined ? whole : String(value);
  });
}
