/**
 * Discriminant carried by every reader error.
 */
export type NumcsvErrorKind =
  | 'input'
  | 'trailing-delimiter'
  | 'field-count'
  | 'numeric-parse'
  | 'sequence'
  | 'options';

/**
 * Base error class for all numcsv errors.
 * Provides formatted error output with the input position and hints.
 */
export abstract class NumcsvError extends Error {
  abstract readonly kind: NumcsvErrorKind;
  readonly hint?: string;

  constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NumcsvError';
    this.hint = hint;
  }

  format(): string {
    const lines: string[] = [];

    lines.push(`error[${this.kind}]: ${this.message}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  /** Where the error happened: an input position or the failing call */
  protected _getExpression(): string {
    return '(reader)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}

export function isNumcsvError(value: unknown): value is NumcsvError {
  return value instanceof NumcsvError;
}
