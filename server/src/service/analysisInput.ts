// src/service/analysisInput.ts
//
// 目的:
// - HTTP / CLI から来た生の入力（unknown）を AnalysisInput / InvestmentParameters に整形する。
// - 金額は数値でも「50L」「1.2cr」のような表記でもよい（magnitude.ts で正規化）。
// - 省略された投資条件は既定値で補う（頭金20%、金利8.5%、20年、経費率30%、諸費用7%、修繕積立1%、保有10年、値上がり5%）。
import { ParseError } from '../errors';
import type { AnalysisInput } from '../model/analysis';
import type { InvestmentParameters } from '../model/investment';
import type { GeoPoint } from '../model/providers';
import { assertInvestmentParameters } from '../scoring/financial';
import { parseAmountField } from '../scoring/magnitude';

export const INVESTMENT_DEFAULTS = {
  downPaymentRate: 0.2,
  annualRate: 0.085,
  termYears: 20,
  operatingExpenseRatio: 0.3,
  closingCostRate: 0.07,
  capexReserveRate: 0.01,
  holdingYears: 10,
  appreciationRate: 0.05,
  saleCostRate: 0,
} as const;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalRecord = (
  value: unknown,
  field: string
): Record<string, unknown> => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ParseError(`${field} must be an object`, { field });
  }
  return value;
};

const readRate = (value: unknown, field: string, fallback: number): number => {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ParseError(`${field} must be a non-negative number`, {
      field,
      value,
    });
  }
  return value;
};

const readOptionalAmount = (value: unknown, field: string) =>
  value === undefined || value === null
    ? undefined
    : parseAmountField(value, field);

const readPoint = (value: unknown): GeoPoint | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ParseError('point must be an object with lat and lon');
  }
  const { lat, lon } = value;
  if (
    typeof lat !== 'number' ||
    typeof lon !== 'number' ||
    !Number.isFinite(lat) ||
    !Number.isFinite(lon) ||
    Math.abs(lat) > 90 ||
    Math.abs(lon) > 180
  ) {
    throw new ParseError('point.lat / point.lon are out of range', {
      lat,
      lon,
    });
  }
  return { lat, lon };
};

export const parseInvestmentParameters = (
  raw: unknown
): InvestmentParameters => {
  if (!isRecord(raw)) {
    throw new ParseError('investment must be an object');
  }

  const purchasePrice = parseAmountField(raw.purchasePrice, 'purchasePrice');
  const monthlyRent = parseAmountField(raw.monthlyRent, 'monthlyRent');
  const annualOperatingExpenses =
    readOptionalAmount(raw.annualOperatingExpenses, 'annualOperatingExpenses') ??
    monthlyRent * 12 * INVESTMENT_DEFAULTS.operatingExpenseRatio;

  const loan = optionalRecord(raw.loan, 'loan');
  const downPaymentRate = readRate(
    raw.downPaymentRate,
    'downPaymentRate',
    INVESTMENT_DEFAULTS.downPaymentRate
  );
  if (downPaymentRate > 1) {
    throw new ParseError('downPaymentRate must be between 0 and 1', {
      downPaymentRate,
    });
  }
  const principal =
    readOptionalAmount(loan.principal, 'loan.principal') ??
    purchasePrice * (1 - downPaymentRate);

  const exit = optionalRecord(raw.exit, 'exit');

  const params: InvestmentParameters = {
    purchasePrice,
    monthlyRent,
    annualOperatingExpenses,
    loan: {
      principal,
      annualRate: readRate(loan.annualRate, 'loan.annualRate', INVESTMENT_DEFAULTS.annualRate),
      termYears: readRate(loan.termYears, 'loan.termYears', INVESTMENT_DEFAULTS.termYears),
    },
    holdingYears: readRate(raw.holdingYears, 'holdingYears', INVESTMENT_DEFAULTS.holdingYears),
    exit: {
      appreciationRate: readRate(
        exit.appreciationRate,
        'exit.appreciationRate',
        INVESTMENT_DEFAULTS.appreciationRate
      ),
      saleCostRate: readRate(exit.saleCostRate, 'exit.saleCostRate', INVESTMENT_DEFAULTS.saleCostRate),
    },
    closingCostRate: readRate(
      raw.closingCostRate,
      'closingCostRate',
      INVESTMENT_DEFAULTS.closingCostRate
    ),
    capexReserveRate: readRate(
      raw.capexReserveRate,
      'capexReserveRate',
      INVESTMENT_DEFAULTS.capexReserveRate
    ),
  };

  assertInvestmentParameters(params);
  return params;
};

export const parseAnalysisInput = (body: unknown): AnalysisInput => {
  if (!isRecord(body)) {
    throw new ParseError('Request body must be a JSON object');
  }

  const address = typeof body.address === 'string' ? body.address.trim() : '';
  if (!address) {
    throw new ParseError('address is required');
  }

  const input: AnalysisInput = { address };

  const point = readPoint(body.point);
  if (point) input.point = point;

  if (body.radiusM !== undefined && body.radiusM !== null) {
    const radiusM = body.radiusM;
    if (typeof radiusM !== 'number' || !Number.isFinite(radiusM) || radiusM <= 0) {
      throw new ParseError('radiusM must be a positive number', { radiusM });
    }
    input.radiusM = radiusM;
  }

  if (body.investment !== undefined && body.investment !== null) {
    input.investment = parseInvestmentParameters(body.investment);
  }

  if (body.propertyId !== undefined && body.propertyId !== null) {
    if (typeof body.propertyId !== 'string' || !body.propertyId.trim()) {
      throw new ParseError('propertyId must be a non-empty string');
    }
    input.propertyId = body.propertyId.trim();
  }

  return input;
};
