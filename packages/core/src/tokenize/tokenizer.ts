/**
 * Tokenizer - splits a pattern string into lexical tokens.
 * @packageDocumentation
 */

import type { Token, TokenizePolicy, PatternError, Result } from '../types'

/**
 * Tokenizer state for tracking position and output.
 */
interface TokenizerState {
  readonly source: string
  readonly policy: TokenizePolicy
  position: number
  readonly tokens: Token[]
}

const ASCII_LETTER = /^[A-Za-z]$/

/**
 * Split a pattern string into tokens.
 *
 * The returned sequence always ends with a single `end` token.
 *
 * @param source - The pattern string to tokenize
 * @param policy - `strict` fails on malformed input, `lenient` emits `invalid-char` tokens instead
 * @returns Tokens, or the first error under the strict policy
 *
 * @public
 */
export function tokenize(source: string, policy: TokenizePolicy = 'strict'): Result<readonly Token[]> {
  const state: TokenizerState = {
    source,
    policy,
    position: 0,
    tokens: [],
  }

  while (state.position < source.length) {
    const start = state.position
    const char = charAt(source, start)
    state.position += char.length

    switch (char) {
      case '*':
        state.tokens.push({ type: 'asterisk', position: start })
        break

      case '+':
        state.tokens.push({ type: 'plus', position: start })
        break

      case '?':
        state.tokens.push({ type: 'question-mark', position: start })
        break

      case '{':
        state.tokens.push({ type: 'open', position: start })
        break

      case '}':
        state.tokens.push({ type: 'close', position: start })
        break

      case '\\': {
        const error = readEscape(state, start)
        if (error) return { ok: false, error }
        break
      }

      case ':':
        state.tokens.push({ type: 'name', value: readName(state), position: start })
        break

      case '(': {
        const error = readRegExp(state, start)
        if (error) return { ok: false, error }
        break
      }

      default:
        state.tokens.push({ type: 'char', value: char, position: start })
    }
  }

  state.tokens.push({ type: 'end', position: source.length })

  return { ok: true, value: state.tokens }
}

/**
 * Read the character following a backslash.
 */
function readEscape(state: TokenizerState, start: number): PatternError | undefined {
  if (state.position >= state.source.length) {
    return invalidOrError(state, start, '\\', {
      code: 'UNEXPECTED_END',
      message: 'Pattern ends with an unfinished escape sequence',
      position: start,
      length: 1,
    })
  }

  const escaped = charAt(state.source, state.position)
  state.position += escaped.length
  state.tokens.push({ type: 'escaped-char', value: escaped, position: start })
  return undefined
}

/**
 * Greedily consume the ASCII letters of a `:name` identifier.
 */
function readName(state: TokenizerState): string {
  let name = ''

  while (state.position < state.source.length) {
    const char = charAt(state.source, state.position)
    if (!ASCII_LETTER.test(char)) break
    name += char
    state.position += char.length
  }

  return name
}

/**
 * Consume a parenthesized group up to its matching `)`.
 *
 * Every `(` opens a level and every `)` closes one. A backslash is kept together
 * with the character after it and never affects depth.
 */
function readRegExp(state: TokenizerState, start: number): PatternError | undefined {
  const { source } = state
  let depth = 1
  let value = ''
  let i = state.position

  while (i < source.length) {
    const char = charAt(source, i)
    i += char.length

    if (char === '\\') {
      if (i >= source.length) break
      const escaped = charAt(source, i)
      i += escaped.length
      value += char + escaped
      continue
    }

    if (char === '(') {
      depth++
    } else if (char === ')') {
      depth--
      if (depth === 0) {
        state.position = i
        state.tokens.push({ type: 'regexp', value, position: start })
        return undefined
      }
    }

    value += char
  }

  return invalidOrError(state, start, '(', {
    code: 'PARENTHESES_MISMATCH',
    message: 'Unclosed group in pattern',
    position: start,
    length: source.length - start,
  })
}

/**
 * Apply the policy to malformed input starting at `start`.
 *
 * Lenient mode records the offending character and resumes right after it.
 */
function invalidOrError(
  state: TokenizerState,
  start: number,
  char: string,
  error: PatternError,
): PatternError | undefined {
  if (state.policy === 'strict') {
    return error
  }

  state.tokens.push({ type: 'invalid-char', value: char, position: start })
  state.position = start + char.length
  return undefined
}

/**
 * Read the full code point at `index`, so surrogate pairs stay together.
 */
function charAt(source: string, index: number): string {
  const codePoint = source.codePointAt(index)
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint)
}
