/**
 * tolerant-numcsv - tolerant numeric CSV reading into float64 matrices
 *
 * Main entry point for the library.
 */

// Re-export errors
export {
  FieldCountError,
  InputError,
  isNumcsvError,
  NumcsvError,
  NumericParseError,
  OptionsError,
  SequenceError,
  TrailingDelimiterError,
  type NumcsvErrorKind,
} from './errors';
// Re-export numeric CSV reading
export {
  DEFAULT_NUMERIC_CSV_OPTIONS,
  LineCursor,
  parseFloatStrict,
  readNumericCsv,
  resolveOptions,
  sourceFromString,
  stripQuotes,
  TolerantRecordReader,
  type FloatParse,
  type InputChunk,
  type InputSource,
  type NumericCsvOptions,
  type NumericCsvReadResult,
  type ReaderState,
  type ResolvedNumericCsvOptions,
} from './io/numeric-csv';
// Re-export matrix
export { Matrix } from './matrix/matrix';
// Re-export result helpers
export { err, ok, unwrap, unwrapErr, type Result } from './types/result';
