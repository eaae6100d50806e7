/**
 * Type definitions for the URL pattern compiler.
 * @packageDocumentation
 */

// Token types
export type {
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
} from './token'

// Part types
export type {
  Modifier,
  Part,
  PlaceholderPart,
  FixedTextPart,
  SegmentWildcardPart,
  FullWildcardPart,
  RegExpPart,
} from './part'

// Options
export type { PatternOptions, ResolvedPatternOptions } from './options'

// Compile output
export type { CompiledUrlPattern } from './compiled'

// Results
export type { Result, Success, Failure } from './result'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { PatternSyntaxError } from './errors'
