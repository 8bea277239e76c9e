/**
 * Transformer Configuration
 * Head classification data and the call conventions of the target toolkit.
 */

// ============================================================
// TYPES
// ============================================================

/**
 * How generated calls are spelled.
 * Templates use `{name}`, `{path}` and `{expr}` placeholders.
 */
export interface EmitConventions {
  /** Base expression for a native tag, e.g. `{name}()` */
  readonly nativeConstructor: string;
  /** Base expression for a component, e.g. `{path}::new()` */
  readonly componentConstructor: string;
  /** Method attaching one child */
  readonly attachOne: string;
  /** Method attaching an iterable of children */
  readonly attachMany: string;
  /** Type-erasure wrapper applied to a deferred child */
  readonly erase: string;
  /** Wrapper applied to the erased deferred child */
  readonly defer: string;
}

export interface MarkupConfig {
  /** Single identifiers mapped to zero-argument constructors */
  readonly nativeTags: readonly string[];
  /** Reserved head taking exactly one child */
  readonly deferredTag: string;
  /** Tested against the last segment of a bare path to detect components */
  readonly componentPattern: RegExp;
  readonly conventions: EmitConventions;
}

/** Partial configuration as written by users */
export interface MarkupConfigInput {
  readonly nativeTags?: readonly string[] | undefined;
  readonly deferredTag?: string | undefined;
  readonly componentPattern?: string | RegExp | undefined;
  readonly conventions?: Partial<EmitConventions> | undefined;
}

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_CONVENTIONS: EmitConventions = Object.freeze({
  nativeConstructor: '{name}()',
  componentConstructor: '{path}::new()',
  attachOne: 'child',
  attachMany: 'children',
  erase: '({expr}).into_any_element()',
  defer: 'deferred({expr})',
});

export const DEFAULT_CONFIG: MarkupConfig = Object.freeze({
  nativeTags: Object.freeze(['div', 'svg', 'img', 'canvas', 'anchored']),
  deferredTag: 'deferred',
  componentPattern: /^[A-Z]/,
  conventions: DEFAULT_CONVENTIONS,
});

// ============================================================
// VALIDATION
// ============================================================

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Placeholder each template must contain */
const REQUIRED_PLACEHOLDERS = {
  nativeConstructor: '{name}',
  componentConstructor: '{path}',
  erase: '{expr}',
  defer: '{expr}',
};

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

/**
 * The pattern is tested once per head, so `g` and `y` are dropped:
 * they would carry `lastIndex` from one test into the next.
 */
function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw invalid(
      `componentPattern is not a valid regular expression (${err instanceof Error ? err.message : String(err)})`
    );
  }
}

function validateConventions(conventions: EmitConventions): void {
  const templated = [
    'nativeConstructor',
    'componentConstructor',
    'erase',
    'defer',
  ] as const;

  for (const field of templated) {
    const placeholder = REQUIRED_PLACEHOLDERS[field];
    const template = conventions[field];
    if (!template.includes(placeholder)) {
      throw invalid(
        `conventions.${field} must contain ${placeholder}, got "${template}"`
      );
    }
  }

  for (const field of ['attachOne', 'attachMany'] as const) {
    if (!IDENTIFIER.test(conventions[field])) {
      throw invalid(
        `conventions.${field} must be a method name, got "${conventions[field]}"`
      );
    }
  }
}

// ============================================================
// RESOLUTION
// ============================================================

/**
 * Merge user input over the defaults and validate the result.
 *
 * @throws Error with "Invalid configuration: {reason}" when a value is unusable
 */
export function resolveConfig(input: MarkupConfigInput = {}): MarkupConfig {
  const nativeTags = input.nativeTags ?? DEFAULT_CONFIG.nativeTags;
  const deferredTag = input.deferredTag ?? DEFAULT_CONFIG.deferredTag;

  for (const tag of nativeTags) {
    if (!IDENTIFIER.test(tag)) {
      throw invalid(`native tag "${tag}" is not an identifier`);
    }
  }
  if (!IDENTIFIER.test(deferredTag)) {
    throw invalid(`deferredTag "${deferredTag}" is not an identifier`);
  }
  if (nativeTags.includes(deferredTag)) {
    throw invalid(`deferredTag "${deferredTag}" is also listed in nativeTags`);
  }

  const componentPattern = compilePattern(
    input.componentPattern ?? DEFAULT_CONFIG.componentPattern
  );

  const conventions: EmitConventions = {
    ...DEFAULT_CONVENTIONS,
    ...input.conventions,
  };
  validateConventions(conventions);

  return {
    nativeTags: [...nativeTags],
    deferredTag,
    componentPattern,
    conventions,
  };
}
