/**
 * URL Pattern Compiler
 *
 * Compiles URL pattern strings (literal text, `:name` placeholders, `*` wildcards,
 * `(regexp)` groups, `{...}` grouping and `?`/`*`/`+` modifiers) into an anchored
 * regular expression source and the ordered list of capture names, following the
 * WHATWG URL Pattern grammar. Designed for downstream use by routers.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Token types
  Token,
  TokenType,
  TokenizePolicy,
  OpenToken,
  CloseToken,
  RegExpToken,
  NameToken,
  CharToken,
  EscapedCharToken,
  PlusToken,
  QuestionMarkToken,
  AsteriskToken,
  EndToken,
  InvalidCharToken,
  // Part types
  Modifier,
  Part,
  PlaceholderPart,
  FixedTextPart,
  SegmentWildcardPart,
  FullWildcardPart,
  RegExpPart,
  // Options
  PatternOptions,
  ResolvedPatternOptions,
  // Compile output
  CompiledUrlPattern,
  // Results
  Result,
  Success,
  Failure,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { PatternSyntaxError } from './types'

// =============================================================================
// Options
// =============================================================================

export { DEFAULT_OPTIONS, PATHNAME_OPTIONS, HOSTNAME_OPTIONS, resolveOptions } from './options'

// =============================================================================
// Tokenizing
// =============================================================================

export { tokenize } from './tokenize'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern, parseTokens } from './parse'
export { validatePattern, isValidPattern } from './parse'

// =============================================================================
// Generation
// =============================================================================

export { generateRegExp, generateNameList, isPlaceholderPart } from './generate'
export { segmentWildcardRegExp, FULL_WILDCARD_REGEXP } from './generate'
export { escapeRegExpString, modifierToString } from './generate'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern, compilePatternOrThrow } from './compile'
