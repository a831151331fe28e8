/**
 * Error module - exports all numcsv error types.
 */

export { NumcsvError, isNumcsvError } from './base';
export type { NumcsvErrorKind } from './base';
export { InputError } from './input-error';
export { TrailingDelimiterError } from './trailing-delimiter';
export { FieldCountError } from './field-count';
export { NumericParseError } from './parse-error';
export { SequenceError } from './sequence-error';
export { OptionsError } from './options-error';
