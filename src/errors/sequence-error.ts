import { NumcsvError } from './base';

/**
 * Error returned when a reader operation is called out of order.
 */
export class SequenceError extends NumcsvError {
  override readonly kind = 'sequence' as const;
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string, hint?: string) {
    super('invalid operation', hint);
    this.name = 'SequenceError';
    this.operation = operation;
    this.state = state;
  }

  protected override _getExpression(): string {
    return `${this.operation}()`;
  }

  protected override _getDetail(): string {
    return `'${this.operation}' cannot be called while the reader is ${this.state}`;
  }
}
