/**
 * Pattern validation - checks whether a pattern compiles.
 * @packageDocumentation
 */

import type { PatternError, PatternOptions } from '../types'
import { parsePattern } from './parser'

/**
 * Validate a pattern string.
 *
 * Returns errors for:
 * - Invalid options
 * - Unfinished escapes and unclosed `(` groups
 * - Unclosed `{` groups and stray tokens
 * - Duplicate placeholder names
 * - Custom regexps that open their own capture group
 *
 * Parsing stops at the first problem, so at most one error is returned.
 *
 * @param source - The pattern string to validate
 * @param options - Delimiter and prefix configuration
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string, options: PatternOptions = {}): readonly PatternError[] {
  const result = parsePattern(source, options)
  return result.ok ? [] : [result.error]
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The pattern string to check
 * @param options - Delimiter and prefix configuration
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidPattern(source: string, options: PatternOptions = {}): boolean {
  return validatePattern(source, options).length === 0
}
