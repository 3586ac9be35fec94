import { ParseError } from '../errors';
import {
  INVESTMENT_DEFAULTS,
  parseAnalysisInput,
  parseInvestmentParameters,
} from '../service/analysisInput';

describe('parseInvestmentParameters', () => {
  test('金額表記を正規化し、省略値は既定値で補う', () => {
    const params = parseInvestmentParameters({
      purchasePrice: '1 Cr',
      monthlyRent: 50_000,
    });

    expect(params.purchasePrice).toBe(10_000_000);
    expect(params.monthlyRent).toBe(50_000);
    expect(params.annualOperatingExpenses).toBeCloseTo(180_000, 6);
    expect(params.loan.principal).toBeCloseTo(8_000_000, 6);
    expect(params.loan.annualRate).toBe(INVESTMENT_DEFAULTS.annualRate);
    expect(params.loan.termYears).toBe(20);
    expect(params).toMatchObject({
      holdingYears: 10,
      exit: { appreciationRate: 0.05, saleCostRate: 0 },
      closingCostRate: 0.07,
      capexReserveRate: 0.01,
    });
  });

  test('明示したローン条件と出口条件はそのまま使う', () => {
    const params = parseInvestmentParameters({
      purchasePrice: 5_000_000,
      monthlyRent: '25k',
      annualOperatingExpenses: '1.2 lakh',
      loan: { principal: '20L', annualRate: 0.07, termYears: 15 },
      holdingYears: 5,
      exit: { appreciationRate: 0.03, saleCostRate: 0.02 },
    });

    expect(params.monthlyRent).toBe(25_000);
    expect(params.annualOperatingExpenses).toBe(120_000);
    expect(params.loan).toEqual({ principal: 2_000_000, annualRate: 0.07, termYears: 15 });
    expect(params.holdingYears).toBe(5);
    expect(params.exit).toEqual({ appreciationRate: 0.03, saleCostRate: 0.02 });
  });

  test('頭金 100% ならローン元本は 0', () => {
    const params = parseInvestmentParameters({
      purchasePrice: 1_000_000,
      monthlyRent: 10_000,
      downPaymentRate: 1,
    });

    expect(params.loan.principal).toBe(0);
  });

  const invalidCases: Array<[string, unknown, string]> = [
    ['オブジェクト以外', 'cheap', 'investment must be an object'],
    [
      '頭金率が 1 超',
      { purchasePrice: 100, monthlyRent: 1, downPaymentRate: 1.5 },
      'downPaymentRate must be between 0 and 1',
    ],
    [
      'loan が配列',
      { purchasePrice: 100, monthlyRent: 1, loan: [] },
      'loan must be an object',
    ],
    [
      '保有年数が負',
      { purchasePrice: 100, monthlyRent: 1, holdingYears: -1 },
      'holdingYears must be a non-negative number',
    ],
    [
      '元本が購入価格を超える',
      { purchasePrice: 100, monthlyRent: 1, loan: { principal: 200 } },
      'loan.principal cannot exceed purchasePrice',
    ],
    [
      '家賃が欠落',
      { purchasePrice: 100 },
      'monthlyRent must be a number or an amount string',
    ],
  ];

  test.each(invalidCases)('%s は ParseError', (_label, raw, message) => {
    expect(() => parseInvestmentParameters(raw)).toThrow(new ParseError(message));
  });
});

describe('parseAnalysisInput', () => {
  test('住所を trim し、任意項目は与えたものだけ入る', () => {
    expect(parseAnalysisInput({ address: '  1 Test Street ' })).toEqual({
      address: '1 Test Street',
    });

    expect(
      parseAnalysisInput({
        address: 'A',
        point: { lat: -33.86, lon: 151.21 },
        radiusM: 750,
        propertyId: '  listing-1 ',
      })
    ).toEqual({
      address: 'A',
      point: { lat: -33.86, lon: 151.21 },
      radiusM: 750,
      propertyId: 'listing-1',
    });
  });

  test('null の任意項目は省略扱い', () => {
    expect(
      parseAnalysisInput({ address: 'A', point: null, radiusM: null, investment: null })
    ).toEqual({ address: 'A' });
  });

  const invalidCases: Array<[string, unknown, string]> = [
    ['配列', [], 'Request body must be a JSON object'],
    ['住所なし', { address: 42 }, 'address is required'],
    ['point が文字列', { address: 'A', point: '35,139' }, 'point must be an object with lat and lon'],
    ['緯度が範囲外', { address: 'A', point: { lat: 91, lon: 0 } }, 'point.lat / point.lon are out of range'],
    ['半径が 0', { address: 'A', radiusM: 0 }, 'radiusM must be a positive number'],
    ['propertyId が空', { address: 'A', propertyId: ' ' }, 'propertyId must be a non-empty string'],
  ];

  test.each(invalidCases)('%s は ParseError', (_label, body, message) => {
    expect(() => parseAnalysisInput(body)).toThrow(new ParseError(message));
  });
});
