import { NumcsvError } from './base';

/**
 * Error returned when the input source fails or ends before a heading line.
 */
export class InputError extends NumcsvError {
  override readonly kind = 'input' as const;
  readonly reason: string;

  constructor(reason: string, cause?: unknown, hint?: string) {
    super('input error', hint, cause === undefined ? undefined : { cause });
    this.name = 'InputError';
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return 'next line';
  }

  protected override _getDetail(): string {
    if (this.cause instanceof Error) {
      return `${this.reason}: ${this.cause.message}`;
    }
    return this.reason;
  }
}
