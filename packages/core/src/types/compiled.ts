import type { Part } from './part'

/**
 * Output of a successful compile.
 *
 * Capture group `i + 1` of the expression corresponds to `names[i]`.
 *
 * @example
 * ```ts
 * const result = compilePattern('/users/:id', PATHNAME_OPTIONS)
 * if (result.ok) {
 *   const re = new RegExp(result.value.regexp, result.value.flags)
 * }
 * ```
 *
 * @public
 */
export interface CompiledUrlPattern {
  /** Original pattern string */
  readonly source: string

  /** Parsed parts, in order */
  readonly parts: readonly Part[]

  /** Regular expression source, anchored with ^ and $ */
  readonly regexp: string

  /** Flags to construct the expression with */
  readonly flags: string

  /** Capture names in capture-group order */
  readonly names: readonly string[]
}
