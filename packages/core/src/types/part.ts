// =============================================================================
// PARTS
// =============================================================================

/**
 * Repetition marker attached to a part.
 *
 * - `optional`: `?`
 * - `zero-or-more`: `*`
 * - `one-or-more`: `+`
 *
 * @public
 */
export type Modifier = 'optional' | 'zero-or-more' | 'one-or-more'

/**
 * One semantic unit of a parsed pattern.
 *
 * @example
 * "/books/:id?" with the pathname options becomes:
 *   [FixedText("/books"), SegmentWildcard(name "id", prefix "/", modifier optional)]
 *
 * @public
 */
export type Part = FixedTextPart | SegmentWildcardPart | FullWildcardPart | RegExpPart

/**
 * Any part that produces a capture group.
 * @public
 */
export type PlaceholderPart = SegmentWildcardPart | FullWildcardPart | RegExpPart

/**
 * Literal text, matched exactly.
 * @public
 */
export interface FixedTextPart {
  readonly type: 'fixed-text'
  readonly value: string
  readonly modifier?: Modifier
}

/**
 * Fields shared by every placeholder.
 */
interface PlaceholderBase {
  /** Capture name; unnamed groups get a numeric label ("0", "1", ...) */
  readonly name: string

  readonly modifier?: Modifier

  /** Literal text bound before each occurrence */
  readonly prefix: string

  /** Literal text bound after each occurrence */
  readonly suffix: string
}

/**
 * `:name` - one or more characters other than the delimiter.
 * @public
 */
export interface SegmentWildcardPart extends PlaceholderBase {
  readonly type: 'segment-wildcard'
}

/**
 * Bare `*` - any characters.
 * @public
 */
export interface FullWildcardPart extends PlaceholderBase {
  readonly type: 'full-wildcard'
}

/**
 * `(regexp)` - a caller-supplied expression, used verbatim.
 * @public
 */
export interface RegExpPart extends PlaceholderBase {
  readonly type: 'regexp'
  readonly value: string
}
