/**
 * Regular expression generator - turns parts into an anchored expression source.
 * @packageDocumentation
 */

import type { Part, PlaceholderPart, ResolvedPatternOptions } from '../types'
import { escapeRegExpString, modifierToString } from './escape'

/**
 * Expression for a bare `*` wildcard: any characters, including the delimiter,
 * matched greedily.
 *
 * @public
 */
export const FULL_WILDCARD_REGEXP = '.*'

/**
 * Build the expression for a segment wildcard: one or more characters other
 * than the delimiter, matched lazily.
 *
 * @public
 */
export function segmentWildcardRegExp(options: ResolvedPatternOptions): string {
  return `[^${escapeRegExpString(options.delimiter)}]+?`
}

/**
 * Generate a regular expression source for a list of parts.
 *
 * Each placeholder contributes exactly one capture group, in part order.
 * Repeated placeholders with a prefix or suffix bind each repetition's suffix to
 * the next repetition's prefix inside that single group, so a match like
 * `/a/b/c` for `{/:seg}+` is captured whole.
 *
 * @param parts - Parsed parts
 * @param options - Resolved options; `delimiter` shapes segment wildcards
 * @returns Expression source anchored with `^` and `$`
 *
 * @public
 */
export function generateRegExp(parts: readonly Part[], options: ResolvedPatternOptions): string {
  let result = '^'

  for (const part of parts) {
    if (part.type === 'fixed-text') {
      const value = escapeRegExpString(part.value)
      result += part.modifier ? `(?:${value})${modifierToString(part.modifier)}` : value
      continue
    }

    result += placeholderRegExp(part, options)
  }

  return result + '$'
}

/**
 * Capture names of a part list, in capture-group order.
 *
 * @public
 */
export function generateNameList(parts: readonly Part[]): readonly string[] {
  return parts.filter(isPlaceholderPart).map((part) => part.name)
}

/**
 * @public
 */
export function isPlaceholderPart(part: Part): part is PlaceholderPart {
  return part.type !== 'fixed-text'
}

function placeholderRegExp(part: PlaceholderPart, options: ResolvedPatternOptions): string {
  const fragment = fragmentFor(part, options)
  const prefix = escapeRegExpString(part.prefix)
  const suffix = escapeRegExpString(part.suffix)
  const modifier = modifierToString(part.modifier)

  if (prefix === '' && suffix === '') {
    switch (part.modifier) {
      case undefined:
        return `(${fragment})`
      case 'optional':
        return `(${fragment})${modifier}`
      case 'zero-or-more':
      case 'one-or-more':
        return `((?:${fragment})${modifier})`
    }
  }

  switch (part.modifier) {
    case undefined:
      return `(?:${prefix}(${fragment})${suffix})`
    case 'optional':
      return `(?:${prefix}(${fragment})${suffix})${modifier}`
    case 'zero-or-more':
      return `(?:${prefix}((?:${fragment})(?:${suffix}${prefix}(?:${fragment}))*)${suffix})?`
    case 'one-or-more':
      return `(?:${prefix}((?:${fragment})(?:${suffix}${prefix}(?:${fragment}))*)${suffix})`
  }
}

function fragmentFor(part: PlaceholderPart, options: ResolvedPatternOptions): string {
  switch (part.type) {
    case 'segment-wildcard':
      return segmentWildcardRegExp(options)
    case 'full-wildcard':
      return FULL_WILDCARD_REGEXP
    case 'regexp':
      return part.value
  }
}
