import { InvalidPercentFormatError } from '@stockroom/shared';

/**
 * A percentage as written ("40%") alongside its numeric forms.
 */
export interface Percent {
  /** The string as supplied, or null when absent */
  readonly raw: string | null;
  /** 40 for "40%" */
  readonly value: number;
  /** 0.4 for "40%" */
  readonly fraction: number;
}

const ZERO_PERCENT: Percent = { raw: null, value: 0, fraction: 0 };

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a percent string. One trailing '%' is optional; surrounding
 * whitespace is ignored. Absent or blank input is zero percent. Anything
 * else that is not a plain decimal throws InvalidPercentFormatError.
 */
export function parsePercent(input: string | null | undefined, field = 'percent'): Percent {
  if (input === null || input === undefined || input.trim() === '') {
    return { ...ZERO_PERCENT, raw: input ?? null };
  }

  const trimmed = input.trim();
  const digits = (trimmed.endsWith('%') ? trimmed.slice(0, -1) : trimmed).trim();

  if (!DECIMAL_PATTERN.test(digits)) {
    throw new InvalidPercentFormatError(field, input);
  }

  const value = Number(digits);
  return { raw: input, value, fraction: value / 100 };
}

export function formatPercent(percent: Percent): string {
  return `${percent.value}%`;
}
