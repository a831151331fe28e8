import {
  FieldCountError,
  InputError,
  type NumcsvError,
  NumericParseError,
  OptionsError,
  SequenceError,
  TrailingDelimiterError,
} from '../../errors';
import { Matrix } from '../../matrix/matrix';
import type { Result } from '../../types/result';
import { err, ok } from '../../types/result';
import { dropTrailingEmpty, parseFloatStrict, splitFields, stripQuotes } from './fields';
import { type InputSource, LineCursor, sourceFromString } from './line-cursor';
import { type NumericCsvOptions, type ResolvedNumericCsvOptions, resolveOptions } from './options';

/**
 * Lifecycle of a reader.
 *
 * fresh → heading-read → reading → exhausted, or fresh → reading when the
 * heading is skipped. Any error moves the reader to failed.
 */
export type ReaderState = 'fresh' | 'heading-read' | 'reading' | 'exhausted' | 'failed';

/**
 * Reads a numeric matrix from loosely formatted delimited text.
 *
 * Blank and comment lines are tolerated before the heading only. Data rows
 * always accept one trailing delimiter; the heading accepts one only when
 * allowTrailingDelimiter is set. The reader never closes its source.
 *
 * @example
 * ```ts
 * const reader = new TolerantRecordReader(fs.createReadStream('data.csv'), {
 *   commentPrefix: '#',
 * });
 * const heading = unwrap(await reader.readHeading());
 * const matrix = unwrap(await reader.readAll());
 * ```
 */
export class TolerantRecordReader {
  readonly options: ResolvedNumericCsvOptions;

  private readonly cursor: LineCursor;
  private _state: ReaderState = 'fresh';
  private _fieldCount: number;
  private headingConsumed = false;
  private _trailingDelimiterSeen = false;

  /**
   * @throws OptionsError if the options are invalid
   */
  constructor(source: InputSource, options?: NumericCsvOptions) {
    this.options = resolveOptions(options);
    this.cursor = new LineCursor(source);
    this._fieldCount = this.options.expectedFieldCount;
  }

  static fromString(text: string, options?: NumericCsvOptions): TolerantRecordReader {
    return new TolerantRecordReader(sourceFromString(text), options);
  }

  get state(): ReaderState {
    return this._state;
  }

  /** Fields per line; 0 until configured or inferred */
  get fieldCount(): number {
    return this._fieldCount;
  }

  /** Whether the heading ended with an allowed trailing delimiter */
  get trailingDelimiterSeen(): boolean {
    return this._trailingDelimiterSeen;
  }

  /**
   * Reads the heading labels, skipping blank and comment lines before it.
   * Surrounding double quotes are removed from each label.
   */
  async readHeading(): Promise<Result<string[], NumcsvError>> {
    if (this._state !== 'fresh') {
      return this.fail(
        new SequenceError('readHeading', this._state, 'the heading can only be read once, first'),
      );
    }
    if (this.options.skipHeading) {
      return this.fail(
        new SequenceError('readHeading', 'skipping headings', 'unset skipHeading to read one'),
      );
    }

    const { commentPrefix, headingDelimiter, allowTrailingDelimiter } = this.options;
    let line: string | null = null;
    while (true) {
      const next = await this.cursor.next();
      if (!next.ok) return this.fail(next.error);
      line = next.data;
      if (line === null) break;
      if (line === '') continue;
      if (commentPrefix !== '' && line.startsWith(commentPrefix)) continue;
      break;
    }
    if (line === null) {
      return this.fail(
        new InputError('input ended before a heading line', undefined, 'set skipHeading for headless input'),
      );
    }

    const fields = splitFields(line, headingDelimiter);
    if (dropTrailingEmpty(fields)) {
      if (!allowTrailingDelimiter) {
        return this.fail(new TrailingDelimiterError(line, headingDelimiter));
      }
      this._trailingDelimiterSeen = true;
    }

    if (this._fieldCount !== 0 && fields.length !== this._fieldCount) {
      return this.fail(new FieldCountError(this._fieldCount, fields.length, this.cursor.lineNumber));
    }
    this._fieldCount = fields.length;

    this.headingConsumed = true;
    this._state = 'heading-read';
    return ok(fields.map(stripQuotes));
  }

  /**
   * Reads one data record. Resolves to null at end of input, and keeps doing
   * so on later calls.
   */
  async read(): Promise<Result<Float64Array | null, NumcsvError>> {
    switch (this._state) {
      case 'exhausted':
        return ok(null);
      case 'failed':
        return err(new SequenceError('read', 'failed', 'an earlier error left the reader unusable'));
      case 'fresh':
        if (!this.options.skipHeading) {
          return this.fail(
            new SequenceError('read', 'fresh', 'call readHeading() first or set skipHeading'),
          );
        }
        break;
      default:
        break;
    }

    const next = await this.cursor.next();
    if (!next.ok) return this.fail(next.error);
    const line = next.data;
    if (line === null) {
      this._state = 'exhausted';
      return ok(null);
    }
    this._state = 'reading';

    const fields = splitFields(line, this.options.fieldDelimiter);
    dropTrailingEmpty(fields);

    if (!this.headingConsumed) {
      this.headingConsumed = true;
      if (this._fieldCount === 0) this._fieldCount = fields.length;
    }

    const lineNumber = this.cursor.lineNumber;
    if (fields.length !== this._fieldCount) {
      return this.fail(new FieldCountError(this._fieldCount, fields.length, lineNumber));
    }

    const record = new Float64Array(fields.length);
    for (let col = 0; col < fields.length; col++) {
      const text = fields[col] ?? '';
      const parsed = parseFloatStrict(text);
      if (!parsed.valid) {
        return this.fail(new NumericParseError(text, col, lineNumber, parsed.reason));
      }
      record[col] = parsed.value;
    }
    return ok(record);
  }

  /**
   * Reads every remaining record into a rows × fieldCount matrix.
   * Any error discards the rows read so far.
   */
  async readAll(): Promise<Result<Matrix, NumcsvError>> {
    const records: Float64Array[] = [];
    while (true) {
      const result = await this.read();
      if (!result.ok) return result;
      if (result.data === null) break;
      records.push(result.data);
    }
    return ok(Matrix.fromRows(records, this._fieldCount));
  }

  private fail(error: NumcsvError): Result<never, NumcsvError> {
    this._state = 'failed';
    return err(error);
  }
}

export interface NumericCsvReadResult {
  /** Heading labels, or null when skipHeading is set */
  heading: string[] | null;
  matrix: Matrix;
}

/**
 * Reads the heading (unless skipped) and every record from a source.
 */
export async function readNumericCsv(
  source: InputSource | string,
  options?: NumericCsvOptions,
): Promise<Result<NumericCsvReadResult, NumcsvError>> {
  let reader: TolerantRecordReader;
  try {
    reader =
      typeof source === 'string'
        ? TolerantRecordReader.fromString(source, options)
        : new TolerantRecordReader(source, options);
  } catch (error) {
    if (error instanceof OptionsError) return err(error);
    throw error;
  }

  let heading: string[] | null = null;
  if (!reader.options.skipHeading) {
    const headingResult = await reader.readHeading();
    if (!headingResult.ok) return headingResult;
    heading = headingResult.data;
  }

  const matrixResult = await reader.readAll();
  if (!matrixResult.ok) return matrixResult;
  return ok({ heading, matrix: matrixResult.data });
}
