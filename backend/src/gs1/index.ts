export { MAX_ELEMENT_STRING_LENGTH, parseGs1, normalizeInput } from './assembler';
export { buildCatalog, getCatalog, rebuildCatalog, Catalog } from './catalog';
export { encodeElementString, toHumanReadable } from './encoder';
export type { ElementInput } from './encoder';
export { toFieldMap, friendlyFieldName } from './formatter';
export type { FieldMap, FieldMapOptions } from './formatter';
export { Gs1OptionsError } from './errors';
export { DEFAULT_PARSE_OPTIONS, parseOptionsInput, resolveOptions, resolveRequestOptions } from './options';
export type { ParseOptionsInput } from './options';
export { DEFAULT_SCORING_WEIGHTS, SCORING_RULES } from './scoringRules';
export { calculateCheckDigit, decodeDecimal, validateCheckDigit, validateDate } from './validators';
export type * from './types';
