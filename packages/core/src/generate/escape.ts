/**
 * Regular expression escaping.
 * @packageDocumentation
 */

import type { Modifier } from '../types'

/** Syntax characters plus `/`, which delimits regexp literals */
const REGEXP_SPECIAL = /[.+*?^${}()[\]|/\\]/g

/**
 * Backslash-escape every character with special meaning in a regular expression.
 *
 * @example
 * escapeRegExpString('/a.b') // => '\\/a\\.b'
 *
 * @public
 */
export function escapeRegExpString(value: string): string {
  return value.replace(REGEXP_SPECIAL, '\\$&')
}

/**
 * Render a modifier as its pattern character.
 *
 * @public
 */
export function modifierToString(modifier: Modifier | undefined): string {
  switch (modifier) {
    case 'optional':
      return '?'
    case 'zero-or-more':
      return '*'
    case 'one-or-more':
      return '+'
    case undefined:
      return ''
  }
}
