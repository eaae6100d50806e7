/**
 * Caller configuration for a compile.
 * @public
 */
export interface PatternOptions {
  /**
   * Character separating segments. Segment wildcards never match it.
   * Unset means segment wildcards match any character.
   */
  readonly delimiter?: string

  /**
   * Character that, directly before a placeholder, is bound to it as its prefix
   * instead of being kept as literal text.
   */
  readonly prefix?: string

  /** Emit the case-insensitive flag alongside the expression */
  readonly ignoreCase?: boolean
}

/**
 * Options with every field filled in. Unset characters are the empty string.
 * @public
 */
export interface ResolvedPatternOptions {
  readonly delimiter: string
  readonly prefix: string
  readonly ignoreCase: boolean
}
