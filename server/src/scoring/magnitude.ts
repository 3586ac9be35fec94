// src/scoring/magnitude.ts
//
// 目的:
// - 「50L」「1.2 Cr」「Rs. 45,00,000」のような金額表記を数値に正規化する。
// - 推測はしない。曖昧・不正な表記は ParseError にする。
import { ParseError } from '../errors';

const SUFFIX_MULTIPLIERS = new Map<string, number>([
  ['k', 1_000],
  ['thousand', 1_000],
  ['l', 100_000],
  ['lac', 100_000],
  ['lacs', 100_000],
  ['lakh', 100_000],
  ['lakhs', 100_000],
  ['m', 1_000_000],
  ['mn', 1_000_000],
  ['million', 1_000_000],
  ['cr', 10_000_000],
  ['crore', 10_000_000],
  ['crores', 10_000_000],
]);

const CURRENCY_PREFIX = /^(?:rs\.?|inr|₹)\s*/i;
const AMOUNT = /^(\d[\d,]*)(\.\d+)?\s*([a-z]+)?$/i;
const PLAIN_DIGITS = /^\d+$/;
const WESTERN_GROUPING = /^\d{1,3}(?:,\d{3})+$/;
const INDIAN_GROUPING = /^\d{1,2}(?:,\d{2})*,\d{3}$/;

const isWellGrouped = (integerPart: string) =>
  PLAIN_DIGITS.test(integerPart) ||
  WESTERN_GROUPING.test(integerPart) ||
  INDIAN_GROUPING.test(integerPart);

export const parseMagnitudeAmount = (input: string): number => {
  const text = input.trim();
  if (!text) {
    throw new ParseError('Amount is empty');
  }

  const body = text.replace(CURRENCY_PREFIX, '');
  const match = AMOUNT.exec(body);
  if (!match) {
    throw new ParseError(`Unrecognised amount "${input}"`, { input });
  }

  const [, integerPart, fraction = '', rawSuffix] = match;
  if (!isWellGrouped(integerPart)) {
    throw new ParseError(`Malformed digit grouping in "${input}"`, { input });
  }

  let multiplier = 1;
  if (rawSuffix) {
    const suffix = rawSuffix.toLowerCase();
    const known = SUFFIX_MULTIPLIERS.get(suffix);
    if (known === undefined) {
      throw new ParseError(`Unknown magnitude suffix "${rawSuffix}"`, {
        input,
      });
    }
    multiplier = known;
  }

  const value = Number(`${integerPart.replace(/,/g, '')}${fraction}`);
  return Math.round(value * multiplier * 100) / 100;
};

/** Accepts a finite non-negative number or a magnitude string. */
export const parseAmountField = (value: unknown, field: string): number => {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ParseError(`${field} must be a non-negative number`, {
        field,
        value,
      });
    }
    return value;
  }
  if (typeof value === 'string') {
    try {
      return parseMagnitudeAmount(value);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`${field}: ${error.message}`, { field, value });
      }
      throw error;
    }
  }
  throw new ParseError(`${field} must be a number or an amount string`, {
    field,
  });
};
