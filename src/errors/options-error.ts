import { NumcsvError } from './base';

/**
 * Error thrown when reader options are invalid.
 */
export class OptionsError extends NumcsvError {
  override readonly kind = 'options' as const;
  readonly option: string;
  private _detail: string;

  constructor(option: string, detail: string, hint?: string) {
    super('options error', hint);
    this.name = 'OptionsError';
    this.option = option;
    this._detail = detail;
  }

  protected override _getExpression(): string {
    return `options.${this.option}`;
  }

  protected override _getDetail(): string {
    return this._detail;
  }
}
