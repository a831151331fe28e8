import { NumcsvError } from './base';

/**
 * Error returned when a data field is not a float literal.
 */
export class NumericParseError extends NumcsvError {
  override readonly kind = 'numeric-parse' as const;
  readonly text: string;
  /** 0-based column index */
  readonly column: number;
  /** 1-based line number in the input */
  readonly lineNumber: number;
  readonly reason: string;

  constructor(text: string, column: number, lineNumber: number, reason: string) {
    super('parse error');
    this.name = 'NumericParseError';
    this.text = text;
    this.column = column;
    this.lineNumber = lineNumber;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `line ${this.lineNumber}, column ${this.column}`;
  }

  protected override _getDetail(): string {
    return `failed to parse float64 from '${this.text}': ${this.reason}`;
  }
}
