/**
 * Pattern tokenizing utilities.
 * @packageDocumentation
 */

export { tokenize } from './tokenizer'
