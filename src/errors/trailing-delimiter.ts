import { NumcsvError } from './base';

/**
 * Error returned when the heading ends with a delimiter that is not allowed.
 */
export class TrailingDelimiterError extends NumcsvError {
  override readonly kind = 'trailing-delimiter' as const;
  readonly line: string;
  readonly delimiter: string;

  constructor(line: string, delimiter: string) {
    super('extra delimiter at end of line', 'set allowTrailingDelimiter to accept it');
    this.name = 'TrailingDelimiterError';
    this.line = line;
    this.delimiter = delimiter;
  }

  protected override _getExpression(): string {
    return 'readHeading()';
  }

  protected override _getDetail(): string {
    return `heading '${this.line}' ends with '${this.delimiter}'`;
  }
}
