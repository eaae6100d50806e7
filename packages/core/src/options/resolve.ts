/**
 * Option presets and resolution.
 * @packageDocumentation
 */

import type { PatternOptions, ResolvedPatternOptions, PatternError, Result } from '../types'

/**
 * No delimiter and no prefix: segment wildcards match any character.
 * @public
 */
export const DEFAULT_OPTIONS: PatternOptions = {
  delimiter: '',
  prefix: '',
}

/**
 * Options for path patterns: segments split on `/`, and a `/` directly before a
 * placeholder belongs to it.
 * @public
 */
export const PATHNAME_OPTIONS: PatternOptions = {
  delimiter: '/',
  prefix: '/',
}

/**
 * Options for hostname patterns: labels split on `.`.
 * @public
 */
export const HOSTNAME_OPTIONS: PatternOptions = {
  delimiter: '.',
  prefix: '',
}

/**
 * Fill in defaults and check option values.
 *
 * `delimiter` and `prefix` must each be empty or a single character.
 *
 * @param options - Caller-supplied options
 * @returns Resolved options, or an `INVALID_OPTION` error
 *
 * @public
 */
export function resolveOptions(options: PatternOptions = {}): Result<ResolvedPatternOptions> {
  const delimiter = options.delimiter ?? ''
  const prefix = options.prefix ?? ''

  const error = checkCharacter('delimiter', delimiter) ?? checkCharacter('prefix', prefix)
  if (error) {
    return { ok: false, error }
  }

  return {
    ok: true,
    value: {
      delimiter,
      prefix,
      ignoreCase: options.ignoreCase ?? false,
    },
  }
}

function checkCharacter(field: 'delimiter' | 'prefix', value: string): PatternError | undefined {
  // Count code points, not UTF-16 units
  if ([...value].length <= 1) {
    return undefined
  }

  return {
    code: 'INVALID_OPTION',
    message: `Option '${field}' must be a single character, got '${value}'`,
  }
}
