/**
 * Pattern compiler - runs the full tokenize, parse, generate pipeline.
 * @packageDocumentation
 */

import type { CompiledUrlPattern, PatternOptions, Result } from '../types'
import { PatternSyntaxError } from '../types'
import { resolveOptions } from '../options'
import { tokenize } from '../tokenize'
import { parseTokens } from '../parse/parser'
import { generateRegExp, generateNameList } from '../generate'

/**
 * Compile a pattern string to a regular expression source and name list.
 *
 * The compiled pattern includes:
 * - Original source and parsed parts for debugging/analysis
 * - Anchored expression source
 * - Flags (`u`, plus `i` when `ignoreCase` is set)
 * - Capture names in capture-group order
 *
 * Stops at the first error and returns it unchanged.
 *
 * @param source - Pattern source string
 * @param options - Delimiter, prefix and case configuration
 * @returns Compiled pattern, or the first error
 *
 * @public
 */
export function compilePattern(source: string, options: PatternOptions = {}): Result<CompiledUrlPattern> {
  const resolved = resolveOptions(options)
  if (!resolved.ok) return resolved

  const tokens = tokenize(source, 'strict')
  if (!tokens.ok) return tokens

  const parts = parseTokens(tokens.value, resolved.value)
  if (!parts.ok) return parts

  return {
    ok: true,
    value: {
      source,
      parts: parts.value,
      regexp: generateRegExp(parts.value, resolved.value),
      flags: resolved.value.ignoreCase ? 'ui' : 'u',
      names: generateNameList(parts.value),
    },
  }
}

/**
 * Compile a pattern, throwing on failure.
 *
 * @param source - Pattern source string
 * @param options - Delimiter, prefix and case configuration
 * @returns Compiled pattern
 * @throws {@link PatternSyntaxError} if the pattern does not compile
 *
 * @public
 */
export function compilePatternOrThrow(source: string, options: PatternOptions = {}): CompiledUrlPattern {
  const result = compilePattern(source, options)
  if (!result.ok) {
    throw new PatternSyntaxError(source, result.error)
  }
  return result.value
}
