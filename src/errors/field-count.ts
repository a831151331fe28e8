import { NumcsvError } from './base';

/**
 * Error returned when a line has a different number of fields than the fixed count.
 */
export class FieldCountError extends NumcsvError {
  override readonly kind = 'field-count' as const;
  readonly expected: number;
  readonly actual: number;
  /** 1-based line number in the input */
  readonly lineNumber: number;

  constructor(expected: number, actual: number, lineNumber: number) {
    super('wrong number of fields in line', `every line must have ${expected} field(s)`);
    this.name = 'FieldCountError';
    this.expected = expected;
    this.actual = actual;
    this.lineNumber = lineNumber;
  }

  protected override _getExpression(): string {
    return `line ${this.lineNumber}`;
  }

  protected override _getDetail(): string {
    return `expected ${this.expected} field(s), found ${this.actual}`;
  }
}
