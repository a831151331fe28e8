/**
 * Numeric CSV module.
 * Line-by-line tolerant reader producing float64 records and matrices.
 */

export { TolerantRecordReader, readNumericCsv } from './reader';
export type { NumericCsvReadResult, ReaderState } from './reader';
export { LineCursor, sourceFromString } from './line-cursor';
export type { InputChunk, InputSource } from './line-cursor';
export { DEFAULT_NUMERIC_CSV_OPTIONS, resolveOptions } from './options';
export type { NumericCsvOptions, ResolvedNumericCsvOptions } from './options';
export { parseFloatStrict, stripQuotes } from './fields';
export type { FloatParse } from './fields';
