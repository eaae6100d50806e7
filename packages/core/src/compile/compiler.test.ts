import { describe, it, expect } from 'vitest'

import { compilePattern, compilePatternOrThrow } from './compiler'
import { DEFAULT_OPTIONS, HOSTNAME_OPTIONS, PATHNAME_OPTIONS } from '../options'
import { PatternSyntaxError } from '../types'
import type { PatternOptions } from '../types'

function regexpOf(source: string, options: PatternOptions = PATHNAME_OPTIONS): string {
  return compilePatternOrThrow(source, options).regexp
}

describe('compilePattern', () => {
  describe('pathname patterns', () => {
    const cases: Array<[string, string]> = [
      ['abc', '^abc$'],
      ['{foo}', '^foo$'],
      ['{bar}?', '^(?:bar)?$'],
      ['/', String.raw`^\/$`],
      [':foo', String.raw`^([^\/]+?)$`],
      ['/:bar', String.raw`^(?:\/([^\/]+?))$`],
      ['/:foo?', String.raw`^(?:\/([^\/]+?))?$`],
      ['/:foo/:bar', String.raw`^(?:\/([^\/]+?))(?:\/([^\/]+?))$`],
      ['/:foo/:bar?', String.raw`^(?:\/([^\/]+?))(?:\/([^\/]+?))?$`],
      ['/:foo?/:bar?', String.raw`^(?:\/([^\/]+?))?(?:\/([^\/]+?))?$`],
      ['/:foo?/:bar', String.raw`^(?:\/([^\/]+?))?(?:\/([^\/]+?))$`],
      ['/:foo(bar)?', String.raw`^(?:\/(bar))?$`],
      ['/(bar)', String.raw`^(?:\/(bar))$`],
      ['/(bar)?', String.raw`^(?:\/(bar))?$`],
      ['{a:foo(bar)b}?', '^(?:a(bar)b)?$'],
      ['{:foo}?', String.raw`^([^\/]+?)?$`],
      ['{(bar)}?', '^(bar)?$'],
      ['{ab}?', '^(?:ab)?$'],
      ['/*', String.raw`^(?:\/(.*))$`],
      ['/:path+', String.raw`^(?:\/((?:[^\/]+?)(?:\/(?:[^\/]+?))*))$`],
      ['/:path*', String.raw`^(?:\/((?:[^\/]+?)(?:\/(?:[^\/]+?))*))?$`],
      ['/books/:id(\\d+)', String.raw`^\/books(?:\/(\d+))$`],
      ['/file.json', String.raw`^\/file\.json$`],
    ]

    it.each(cases)('compiles %s', (source, expected) => {
      expect(regexpOf(source)).toBe(expected)
    })
  })

  describe('literal-only patterns', () => {
    const optionSets: Array<[string, PatternOptions]> = [
      ['default', DEFAULT_OPTIONS],
      ['pathname', PATHNAME_OPTIONS],
      ['hostname', HOSTNAME_OPTIONS],
    ]

    it.each(optionSets)('escapes the literal with %s options', (_label, options) => {
      expect(regexpOf('a.b/c', options)).toBe(String.raw`^a\.b\/c$`)
    })
  })

  describe('other option sets', () => {
    it('keeps separators as fixed text without a prefix', () => {
      expect(regexpOf('/:foo', DEFAULT_OPTIONS)).toBe(String.raw`^\/([^]+?)$`)
    })

    it('stops hostname segments at dots', () => {
      expect(regexpOf(':sub.example.com', HOSTNAME_OPTIONS)).toBe(String.raw`^([^\.]+?)\.example\.com$`)
    })

    it('treats missing options as no delimiter and no prefix', () => {
      expect(compilePatternOrThrow('/:foo').regexp).toBe(String.raw`^\/([^]+?)$`)
    })
  })

  describe('compiled output', () => {
    it('returns the source, parts, names and flags', () => {
      const result = compilePattern('/users/:id/*', PATHNAME_OPTIONS)

      expect(result).toEqual({
        ok: true,
        value: {
          source: '/users/:id/*',
          parts: [
            { type: 'fixed-text', value: '/users' },
            { type: 'segment-wildcard', name: 'id', prefix: '/', suffix: '' },
            { type: 'full-wildcard', name: '0', prefix: '/', suffix: '' },
          ],
          regexp: String.raw`^\/users(?:\/([^\/]+?))(?:\/(.*))$`,
          flags: 'u',
          names: ['id', '0'],
        },
      })
    })

    it('adds the case-insensitive flag', () => {
      expect(compilePatternOrThrow('/:id', { ...PATHNAME_OPTIONS, ignoreCase: true }).flags).toBe('ui')
    })

    it('is deterministic', () => {
      const first = compilePattern('/:a/(\\d+)/*?', PATHNAME_OPTIONS)
      const second = compilePattern('/:a/(\\d+)/*?', PATHNAME_OPTIONS)

      expect(first).toEqual(second)
    })

    it('produces an expression whose groups line up with the names', () => {
      const compiled = compilePatternOrThrow('/users/:user/posts/(\\d+)', PATHNAME_OPTIONS)
      const match = new RegExp(compiled.regexp, compiled.flags).exec('/users/ada/posts/42')

      expect(compiled.names).toEqual(['user', '0'])
      expect(match?.slice(1)).toEqual(['ada', '42'])
    })

    it('keeps group alignment with a non-capturing group in a custom regexp', () => {
      const compiled = compilePatternOrThrow('/:a(x(?:y))/:b', PATHNAME_OPTIONS)
      const match = new RegExp(compiled.regexp, compiled.flags).exec('/xy/zz')

      expect(compiled.names).toEqual(['a', 'b'])
      expect(match?.slice(1)).toEqual(['xy', 'zz'])
    })

    it('captures a repeated segment run in one group', () => {
      const compiled = compilePatternOrThrow('/:path+', PATHNAME_OPTIONS)
      const match = new RegExp(compiled.regexp, compiled.flags).exec('/a/b/c')

      expect(match?.slice(1)).toEqual(['a/b/c'])
    })
  })

  describe('errors', () => {
    it('reports an unclosed regexp group', () => {
      const result = compilePattern('(abc', PATHNAME_OPTIONS)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('PARENTHESES_MISMATCH')
      }
    })

    it('reports an unclosed brace group', () => {
      const result = compilePattern('{abc', PATHNAME_OPTIONS)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('MISSING_CLOSING_CURLY')
      }
    })

    it('reports duplicate names', () => {
      const result = compilePattern('/:id/:id', PATHNAME_OPTIONS)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('DUPLICATE_NAME')
      }
    })

    it('reports a capturing group inside a custom regexp', () => {
      const result = compilePattern('/:a(x(y))/:b', PATHNAME_OPTIONS)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('CAPTURING_GROUP')
      }
    })

    it('reports invalid options', () => {
      const result = compilePattern('/:id', { prefix: '//' })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('INVALID_OPTION')
      }
    })
  })
})

describe('compilePatternOrThrow', () => {
  it('throws a PatternSyntaxError carrying the error fields', () => {
    let thrown: unknown
    try {
      compilePatternOrThrow('/:id/{x', PATHNAME_OPTIONS)
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(PatternSyntaxError)
    if (thrown instanceof PatternSyntaxError) {
      expect(thrown.name).toBe('PatternSyntaxError')
      expect(thrown.code).toBe('MISSING_CLOSING_CURLY')
      expect(thrown.source).toBe('/:id/{x')
      expect(thrown.position).toBe(5)
      expect(thrown.length).toBe(2)
      expect(thrown.message).toBe('Group opened with { is never closed')
    }
  })
})
