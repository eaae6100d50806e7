/**
 * Pattern parser - converts a token sequence into parts.
 * @packageDocumentation
 */

import type {
  Token,
  TokenType,
  NameToken,
  RegExpToken,
  AsteriskToken,
  Modifier,
  Part,
  PatternError,
  PatternOptions,
  ResolvedPatternOptions,
  Result,
} from '../types'
import { tokenize } from '../tokenize'
import { resolveOptions } from '../options'

/**
 * Parser state for tracking position and output.
 */
interface ParserState {
  readonly tokens: readonly Token[]
  readonly options: ResolvedPatternOptions
  index: number

  /** Literal text collected since the last emitted part */
  pendingFixedValue: string

  /** Next label for an unnamed placeholder */
  nextOrdinal: number

  readonly names: Set<string>
  readonly parts: Part[]
}

/**
 * Everything captured for one placeholder occurrence or brace group.
 */
interface PartCandidate {
  readonly prefix: string
  readonly nameToken?: NameToken
  readonly regexpOrWildcard?: RegExpToken | AsteriskToken
  readonly suffix: string
  readonly modifier?: Modifier
}

/**
 * Parse a pattern string into parts.
 *
 * Convenience function that resolves options, tokenizes and parses in one step.
 *
 * @param source - The pattern string to parse
 * @param options - Delimiter and prefix configuration
 * @returns Parsed parts, or the first error
 *
 * @public
 */
export function parsePattern(source: string, options: PatternOptions = {}): Result<readonly Part[]> {
  const resolved = resolveOptions(options)
  if (!resolved.ok) return resolved

  const tokens = tokenize(source, 'strict')
  if (!tokens.ok) return tokens

  return parseTokens(tokens.value, resolved.value)
}

/**
 * Parse a token sequence into parts.
 *
 * Consumes the tokens once, left to right. Consecutive literal characters are
 * coalesced into a single `fixed-text` part.
 *
 * @param tokens - Tokens ending with an `end` token
 * @param options - Resolved options; only `prefix` is consulted
 * @returns Parsed parts, or the first error
 *
 * @public
 */
export function parseTokens(tokens: readonly Token[], options: ResolvedPatternOptions): Result<readonly Part[]> {
  const state: ParserState = {
    tokens,
    options,
    index: 0,
    pendingFixedValue: '',
    nextOrdinal: 0,
    names: new Set(),
    parts: [],
  }

  for (;;) {
    const charToken = tryConsume(state, 'char')
    const nameToken = tryConsume(state, 'name')
    const regexpOrWildcard = tryConsumeRegExpOrWildcard(state, nameToken)

    // Placeholder, possibly preceded by a prefix character
    if (nameToken || regexpOrWildcard) {
      let prefix = charToken?.value ?? ''
      if (prefix !== '' && prefix !== state.options.prefix) {
        state.pendingFixedValue += prefix
        prefix = ''
      }

      flushPendingFixedValue(state)
      const modifier = tryConsumeModifier(state)

      const error = addPart(state, { prefix, nameToken, regexpOrWildcard, suffix: '', modifier })
      if (error) return { ok: false, error }
      continue
    }

    // Plain literal
    const fixedToken = charToken ?? tryConsume(state, 'escaped-char')
    if (fixedToken) {
      state.pendingFixedValue += fixedToken.value
      continue
    }

    // {prefix :name (regexp) suffix}modifier
    const openToken = tryConsume(state, 'open')
    if (openToken) {
      const prefix = consumeText(state)
      const groupName = tryConsume(state, 'name')
      const groupRegExpOrWildcard = tryConsumeRegExpOrWildcard(state, groupName)
      const suffix = consumeText(state)

      if (!tryConsume(state, 'close')) {
        return {
          ok: false,
          error: {
            code: 'MISSING_CLOSING_CURLY',
            message: 'Group opened with { is never closed',
            position: openToken.position,
            length: currentToken(state).position - openToken.position,
          },
        }
      }

      const modifier = tryConsumeModifier(state)

      const error = addPart(state, {
        prefix,
        nameToken: groupName,
        regexpOrWildcard: groupRegExpOrWildcard,
        suffix,
        modifier,
      })
      if (error) return { ok: false, error }
      continue
    }

    flushPendingFixedValue(state)

    if (!tryConsume(state, 'end')) {
      const token = currentToken(state)
      return {
        ok: false,
        error: {
          code: 'UNEXPECTED_END',
          message: `Expected end of pattern, found ${describeToken(token)}`,
          position: token.position,
          length: 1,
        },
      }
    }

    return { ok: true, value: state.parts }
  }
}

/**
 * Append a part for a placeholder or brace group.
 */
function addPart(state: ParserState, candidate: PartCandidate): PatternError | undefined {
  const { prefix, nameToken, regexpOrWildcard, suffix, modifier } = candidate

  // A "{foo}" grouping: plain text
  if (!nameToken && !regexpOrWildcard && !modifier) {
    state.pendingFixedValue += prefix
    return undefined
  }

  flushPendingFixedValue(state)

  // A "{foo}?" grouping: text with a modifier
  if (!nameToken && !regexpOrWildcard) {
    if (prefix !== '') {
      state.parts.push({ type: 'fixed-text', value: prefix, modifier })
    }
    return undefined
  }

  let name: string
  let position: number
  if (nameToken) {
    name = nameToken.value
    position = nameToken.position
  } else {
    name = String(state.nextOrdinal++)
    // Only reachable with a regexp or asterisk token
    position = regexpOrWildcard?.position ?? 0
  }

  if (state.names.has(name)) {
    return {
      code: 'DUPLICATE_NAME',
      message: `Duplicate placeholder name '${name}'`,
      position,
      length: nameToken ? name.length + 1 : 1,
    }
  }
  state.names.add(name)

  if (regexpOrWildcard?.type === 'regexp') {
    const error = checkRegExpValue(regexpOrWildcard)
    if (error) return error

    state.parts.push({ type: 'regexp', name, value: regexpOrWildcard.value, modifier, prefix, suffix })
  } else if (regexpOrWildcard?.type === 'asterisk') {
    state.parts.push({ type: 'full-wildcard', name, modifier, prefix, suffix })
  } else {
    state.parts.push({ type: 'segment-wildcard', name, modifier, prefix, suffix })
  }

  return undefined
}

/**
 * Reject a custom regexp that opens a capture group of its own, or whose leading
 * `?` would turn the placeholder's own group into a non-capturing one.
 *
 * Each placeholder owns exactly one capture group, so plain `(` and `(?<name>` groups
 * are refused while `(?:`, lookaheads, lookbehinds and escaped or bracketed parentheses are fine.
 */
function checkRegExpValue(token: RegExpToken): PatternError | undefined {
  const { value } = token
  let inClass = false

  if (value.startsWith('?')) {
    return {
      code: 'INVALID_REGEXP',
      message: `Custom regexp '(${value})' must not start with '?'`,
      position: token.position + 1,
      length: 1,
    }
  }

  for (let i = 0; i < value.length; i++) {
    const char = value[i]

    if (char === '\\') {
      i++
      continue
    }

    if (inClass) {
      if (char === ']') inClass = false
      continue
    }

    if (char === '[') {
      inClass = true
      continue
    }

    if (char !== '(') continue

    const capturing =
      value[i + 1] !== '?' || (value[i + 2] === '<' && value[i + 3] !== '=' && value[i + 3] !== '!')
    if (capturing) {
      return {
        code: 'CAPTURING_GROUP',
        message: `Capturing groups are not allowed inside '(${value})'; use (?:...) instead`,
        // Offset past the opening parenthesis of the token
        position: token.position + 1 + i,
        length: 1,
      }
    }
  }

  return undefined
}

/**
 * Turn the pending fixed value into a `fixed-text` part, if there is any.
 */
function flushPendingFixedValue(state: ParserState): void {
  if (state.pendingFixedValue === '') {
    return
  }

  state.parts.push({ type: 'fixed-text', value: state.pendingFixedValue })
  state.pendingFixedValue = ''
}

/**
 * Consume a run of `char` and `escaped-char` tokens as literal text.
 */
function consumeText(state: ParserState): string {
  let text = ''

  for (;;) {
    const token = tryConsume(state, 'char') ?? tryConsume(state, 'escaped-char')
    if (!token) return text
    text += token.value
  }
}

/**
 * Consume a `regexp` token, or a bare `*` when no name precedes it.
 *
 * After a name, `*` is a modifier rather than a wildcard.
 */
function tryConsumeRegExpOrWildcard(
  state: ParserState,
  nameToken: NameToken | undefined,
): RegExpToken | AsteriskToken | undefined {
  const token = tryConsume(state, 'regexp')
  if (!nameToken && !token) {
    return tryConsume(state, 'asterisk')
  }
  return token
}

function tryConsumeModifier(state: ParserState): Modifier | undefined {
  if (tryConsume(state, 'question-mark')) return 'optional'
  if (tryConsume(state, 'asterisk')) return 'zero-or-more'
  if (tryConsume(state, 'plus')) return 'one-or-more'
  return undefined
}

/**
 * Consume the next token if it has the given type.
 */
function tryConsume<K extends TokenType>(state: ParserState, type: K): Extract<Token, { type: K }> | undefined {
  const token = state.tokens[state.index]
  if (token === undefined || !isTokenOfType(token, type)) {
    return undefined
  }
  state.index++
  return token
}

function isTokenOfType<K extends TokenType>(token: Token, type: K): token is Extract<Token, { type: K }> {
  return token.type === type
}

/**
 * The token under the cursor. Past the end, a synthetic `end` token.
 */
function currentToken(state: ParserState): Token {
  const token = state.tokens[state.index]
  if (token !== undefined) return token
  const last = state.tokens[state.tokens.length - 1]
  return { type: 'end', position: last === undefined ? 0 : last.position }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'open':
      return "'{'"
    case 'close':
      return "'}'"
    case 'plus':
      return "'+'"
    case 'question-mark':
      return "'?'"
    case 'asterisk':
      return "'*'"
    case 'end':
      return 'end of tokens'
    case 'regexp':
      return `group '(${token.value})'`
    case 'name':
      return `name ':${token.value}'`
    case 'char':
    case 'escaped-char':
    case 'invalid-char':
      return `'${token.value}'`
  }
}
