// =============================================================================
// TOKENS
// =============================================================================

/**
 * Lexical token produced by the tokenizer.
 *
 * @example
 * "/:id(\\d+)?" becomes:
 *   [Char("/"), Name("id"), RegExp("\\d+"), QuestionMark, End]
 *
 * @public
 */
export type Token =
  | OpenToken
  | CloseToken
  | RegExpToken
  | NameToken
  | CharToken
  | EscapedCharToken
  | PlusToken
  | QuestionMarkToken
  | AsteriskToken
  | EndToken
  | InvalidCharToken

/**
 * @public
 */
export type TokenType = Token['type']

/**
 * How the tokenizer reacts to malformed input.
 *
 * - `strict`: fail with a {@link PatternError}
 * - `lenient`: emit an `invalid-char` token and keep going
 *
 * @public
 */
export type TokenizePolicy = 'strict' | 'lenient'

interface TokenBase {
  /** Offset in the source string where the token starts */
  readonly position: number
}

/** `{` @public */
export interface OpenToken extends TokenBase {
  readonly type: 'open'
}

/** `}` @public */
export interface CloseToken extends TokenBase {
  readonly type: 'close'
}

/**
 * A parenthesized custom group. `value` excludes the outer parentheses.
 * @public
 */
export interface RegExpToken extends TokenBase {
  readonly type: 'regexp'
  readonly value: string
}

/**
 * `:name`. `value` holds the identifier without the colon and may be empty.
 * @public
 */
export interface NameToken extends TokenBase {
  readonly type: 'name'
  readonly value: string
}

/** @public */
export interface CharToken extends TokenBase {
  readonly type: 'char'
  readonly value: string
}

/**
 * A backslash escape. `value` is the escaped character alone.
 * @public
 */
export interface EscapedCharToken extends TokenBase {
  readonly type: 'escaped-char'
  readonly value: string
}

/** `+` @public */
export interface PlusToken extends TokenBase {
  readonly type: 'plus'
}

/** `?` @public */
export interface QuestionMarkToken extends TokenBase {
  readonly type: 'question-mark'
}

/** `*` @public */
export interface AsteriskToken extends TokenBase {
  readonly type: 'asterisk'
}

/**
 * Sentinel. Always exactly one, always last.
 * @public
 */
export interface EndToken extends TokenBase {
  readonly type: 'end'
}

/**
 * Malformed input kept by the lenient policy.
 * @public
 */
export interface InvalidCharToken extends TokenBase {
  readonly type: 'invalid-char'
  readonly value: string
}
