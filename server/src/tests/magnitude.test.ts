import { ParseError } from '../errors';
import { parseAmountField, parseMagnitudeAmount } from '../scoring/magnitude';

const validCases: Array<[string, number]> = [
  ['50L', 5_000_000],
  ['1.2 Cr', 12_000_000],
  ['2.5 lakhs', 250_000],
  ['25k', 25_000],
  ['3 million', 3_000_000],
  ['Rs. 45,00,000', 4_500_000],
  ['₹4,500,000', 4_500_000],
  ['INR 1,00,000', 100_000],
  ['  750000  ', 750_000],
  ['1234.567', 1234.57],
];

const invalidCases = [
  '',
  '   ',
  'abc',
  '50 XL',
  '4,50,0000',
  '-50L',
  '1e5',
  '5 0L',
  '50 L L',
];

describe('parseMagnitudeAmount', () => {
  test.each(validCases)('"%s" → %p', (input, expected) => {
    expect(parseMagnitudeAmount(input)).toBe(expected);
  });

  test.each(invalidCases)('"%s" は ParseError', (input) => {
    expect(() => parseMagnitudeAmount(input)).toThrow(ParseError);
  });

  test('未知の単位はエラーメッセージに単位を含める', () => {
    expect(() => parseMagnitudeAmount('50 XL')).toThrow(
      'Unknown magnitude suffix "XL"'
    );
  });

  test('桁区切りが崩れている場合は推測しない', () => {
    expect(() => parseMagnitudeAmount('4,50,0000')).toThrow(
      'Malformed digit grouping in "4,50,0000"'
    );
  });
});

describe('parseAmountField', () => {
  test('数値はそのまま、文字列は表記を正規化する', () => {
    expect(parseAmountField(123, 'monthlyRent')).toBe(123);
    expect(parseAmountField('50L', 'purchasePrice')).toBe(5_000_000);
  });

  test('エラーメッセージにフィールド名を付ける', () => {
    expect(() => parseAmountField('bad', 'purchasePrice')).toThrow(
      'purchasePrice: Unrecognised amount "bad"'
    );
    expect(() => parseAmountField(-1, 'monthlyRent')).toThrow(
      'monthlyRent must be a non-negative number'
    );
    expect(() => parseAmountField(true, 'monthlyRent')).toThrow(
      'monthlyRent must be a number or an amount string'
    );
  });
});
