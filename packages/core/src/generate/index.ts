/**
 * Regular expression generation utilities.
 * @packageDocumentation
 */

export {
  generateRegExp,
  generateNameList,
  isPlaceholderPart,
  segmentWildcardRegExp,
  FULL_WILDCARD_REGEXP,
} from './regexp-generator'
export { escapeRegExpString, modifierToString } from './escape'
