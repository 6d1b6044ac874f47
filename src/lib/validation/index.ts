/**
 * Content validation exports
 */

export { isCleanText, invalidCharRatio, collapseWhitespace, DEFAULT_MAX_INVALID_RATIO } from './clean-text';
export { isPlainObject, isStringArray } from './type-guards';
