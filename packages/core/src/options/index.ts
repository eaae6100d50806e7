/**
 * Option utilities.
 * @packageDocumentation
 */

export { DEFAULT_OPTIONS, PATHNAME_OPTIONS, HOSTNAME_OPTIONS, resolveOptions } from './resolve'
