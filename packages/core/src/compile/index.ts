/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern, compilePatternOrThrow } from './compiler'
