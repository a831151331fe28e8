import { OptionsError } from '../../errors';

/**
 * Numeric CSV reading options.
 */
export interface NumericCsvOptions {
  /** Data field delimiter (default: ",") */
  fieldDelimiter?: string;

  /** Heading delimiter (default: same as fieldDelimiter) */
  headingDelimiter?: string;

  /** Whether the heading may end with one delimiter (default: false) */
  allowTrailingDelimiter?: boolean;

  /** Lines starting with this prefix are skipped before the heading (default: "" = disabled) */
  commentPrefix?: string;

  /** Number of fields per line (default: 0 = infer from the first line) */
  expectedFieldCount?: number;

  /** Whether the input has no heading row (default: false) */
  skipHeading?: boolean;
}

/** Default numeric CSV options */
export const DEFAULT_NUMERIC_CSV_OPTIONS = {
  fieldDelimiter: ',',
  headingDelimiter: '',
  allowTrailingDelimiter: false,
  commentPrefix: '',
  expectedFieldCount: 0,
  skipHeading: false,
} as const;

/** Options with every default applied */
export interface ResolvedNumericCsvOptions {
  readonly fieldDelimiter: string;
  readonly headingDelimiter: string;
  readonly allowTrailingDelimiter: boolean;
  readonly commentPrefix: string;
  readonly expectedFieldCount: number;
  readonly skipHeading: boolean;
}

/**
 * Merges user options over the defaults and validates them.
 * An unset or empty headingDelimiter resolves to fieldDelimiter.
 * @throws OptionsError on an empty fieldDelimiter or a bad expectedFieldCount
 */
export function resolveOptions(options?: NumericCsvOptions): ResolvedNumericCsvOptions {
  const opts = { ...DEFAULT_NUMERIC_CSV_OPTIONS, ...options };

  if (opts.fieldDelimiter === '') {
    throw new OptionsError('fieldDelimiter', 'delimiter must not be empty', 'use "," or "\\t"');
  }
  if (!Number.isInteger(opts.expectedFieldCount) || opts.expectedFieldCount < 0) {
    throw new OptionsError(
      'expectedFieldCount',
      `expected a non-negative integer, got ${opts.expectedFieldCount}`,
      'use 0 to infer the count from the first line',
    );
  }

  return Object.freeze({
    fieldDelimiter: opts.fieldDelimiter,
    headingDelimiter: opts.headingDelimiter === '' ? opts.fieldDelimiter : opts.headingDelimiter,
    allowTrailingDelimiter: opts.allowTrailingDelimiter,
    commentPrefix: opts.commentPrefix,
    expectedFieldCount: opts.expectedFieldCount,
    skipHeading: opts.skipHeading,
  });
}

