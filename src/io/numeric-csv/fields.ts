const QUOTE = '"';

const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_LITERAL = /^([+-]?)(?:inf|infinity)$/i;
const NAN_LITERAL = /^nan$/i;

/**
 * Splits a line on the delimiter. Always yields at least one field.
 */
export function splitFields(line: string, delimiter: string): string[] {
  return line.split(delimiter);
}

/**
 * Drops a final empty field in place. Returns whether one was dropped.
 */
export function dropTrailingEmpty(fields: string[]): boolean {
  if (fields.length > 0 && fields[fields.length - 1] === '') {
    fields.pop();
    return true;
  }
  return false;
}

/**
 * Removes at most one leading and one trailing double quote.
 * Unpaired quotes are stripped too; inner quotes are left alone.
 */
export function stripQuotes(field: string): string {
  let start = 0;
  let end = field.length;
  if (end > 0 && field.endsWith(QUOTE)) end--;
  if (start < end && field.startsWith(QUOTE)) start++;
  return field.slice(start, end);
}

export type FloatParse = { valid: true; value: number } | { valid: false; reason: string };

/**
 * Parses a float64 from decimal or scientific notation, a signed inf/infinity,
 * or an unsigned nan.
 * Whitespace, hex and empty text are rejected. Finite literals that overflow
 * float64 are out of range.
 */
export function parseFloatStrict(text: string): FloatParse {
  if (text === '') return { valid: false, reason: 'empty field' };

  if (DECIMAL_LITERAL.test(text)) {
    const value = Number(text);
    if (!Number.isFinite(value)) return { valid: false, reason: 'value out of range' };
    return { valid: true, value };
  }

  if (NAN_LITERAL.test(text)) return { valid: true, value: Number.NaN };

  const infinity = INFINITY_LITERAL.exec(text);
  if (infinity) {
    return {
      valid: true,
      value: infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY,
    };
  }

  return { valid: false, reason: 'invalid syntax' };
}
