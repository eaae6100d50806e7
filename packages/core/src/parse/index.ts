/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern, parseTokens } from './parser'
export { validatePattern, isValidPattern } from './validator'
