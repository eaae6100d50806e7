import { describe, it, expect } from 'vitest'

import { validatePattern, isValidPattern } from './validator'
import { PATHNAME_OPTIONS } from '../options'

describe('validatePattern', () => {
  it('returns empty array for valid patterns', () => {
    const valid = ['/books/:id', '/:foo(bar)?', '{a:foo(bar)b}?', '/*', '/\\*', '{/:seg}+', '']

    for (const src of valid) {
      expect(validatePattern(src, PATHNAME_OPTIONS), `Expected no errors for ${src}`).toEqual([])
    }
  })

  it('returns the first error', () => {
    const errors = validatePattern('/:id/:id/{x', PATHNAME_OPTIONS)

    expect(errors).toHaveLength(1)
    expect(errors[0].code).toBe('DUPLICATE_NAME')
  })

  it('detects an unclosed regexp group', () => {
    expect(validatePattern('/(abc', PATHNAME_OPTIONS).map((e) => e.code)).toEqual(['PARENTHESES_MISMATCH'])
  })

  it('detects an unclosed brace group', () => {
    expect(validatePattern('{abc', PATHNAME_OPTIONS).map((e) => e.code)).toEqual(['MISSING_CLOSING_CURLY'])
  })
})

describe('isValidPattern', () => {
  it('returns true for valid patterns', () => {
    expect(isValidPattern('/:id', PATHNAME_OPTIONS)).toBe(true)
    expect(isValidPattern('/files/*')).toBe(true)
  })

  it('returns false for invalid patterns', () => {
    expect(isValidPattern('/:id?+', PATHNAME_OPTIONS)).toBe(false)
    expect(isValidPattern('(abc')).toBe(false)
    expect(isValidPattern('/:id', { delimiter: 'ab' })).toBe(false)
  })
})
