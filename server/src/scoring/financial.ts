// src/scoring/financial.ts
//
// 目的:
// - 賃料・経費・ローン償還から年次キャッシュフローを組み立て、DSCR / CoC / 損益分岐稼働率 / IRR を算出する。
// 前後関係:
// - IRR の解法は irr.ts。ここでは初期値を変えて再試行し、全滅なら irr を null にして他の指標は返す。
// - 入力検証は assertInvestmentParameters。HTTP 入力の整形は service/analysisInput.ts。
import { NonConvergenceError, ParseError, toErrorPayload } from '../errors';
import type {
  InvestmentMetrics,
  InvestmentParameters,
  InvestmentQuality,
  InvestmentRecommendation,
  OnePercentRuleVerdict,
} from '../model/investment';
import { DEFAULT_IRR_OPTIONS, solveIrrWithFallbacks, type IrrOptions } from './irr';

export interface FinancialConfig {
  irr: IrrOptions;
  fallbackGuesses: number[];
}

export const DEFAULT_FINANCIAL_CONFIG: FinancialConfig = {
  irr: DEFAULT_IRR_OPTIONS,
  fallbackGuesses: [0.05, 0, 0.25, -0.05],
};

const ensureNonNegative = (value: number, field: string) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new ParseError(`${field} must be a non-negative number`, {
      field,
      value,
    });
  }
};

export const assertInvestmentParameters = (params: InvestmentParameters) => {
  ensureNonNegative(params.purchasePrice, 'purchasePrice');
  ensureNonNegative(params.monthlyRent, 'monthlyRent');
  ensureNonNegative(params.annualOperatingExpenses, 'annualOperatingExpenses');
  ensureNonNegative(params.loan.principal, 'loan.principal');
  ensureNonNegative(params.loan.annualRate, 'loan.annualRate');
  ensureNonNegative(params.loan.termYears, 'loan.termYears');
  ensureNonNegative(params.holdingYears, 'holdingYears');
  ensureNonNegative(params.exit.appreciationRate, 'exit.appreciationRate');
  ensureNonNegative(params.exit.saleCostRate, 'exit.saleCostRate');
  ensureNonNegative(params.closingCostRate, 'closingCostRate');
  ensureNonNegative(params.capexReserveRate, 'capexReserveRate');

  if (params.purchasePrice === 0) {
    throw new ParseError('purchasePrice must be greater than zero');
  }
  if (params.loan.principal > params.purchasePrice) {
    throw new ParseError('loan.principal cannot exceed purchasePrice', {
      principal: params.loan.principal,
      purchasePrice: params.purchasePrice,
    });
  }
  // 月数に丸めて 0 回払いになる期間では返済額が定義できない
  if (params.loan.principal > 0 && Math.round(params.loan.termYears * 12) < 1) {
    throw new ParseError(
      'loan.termYears must cover at least one monthly payment when borrowing',
      { termYears: params.loan.termYears }
    );
  }
  if (!Number.isInteger(params.holdingYears) || params.holdingYears < 1) {
    throw new ParseError('holdingYears must be a positive integer', {
      holdingYears: params.holdingYears,
    });
  }
};

export const monthlyLoanPayment = (
  principal: number,
  annualRate: number,
  termYears: number
): number => {
  if (principal <= 0) return 0;
  const n = Math.round(termYears * 12);
  const r = annualRate / 12;
  if (r === 0) return principal / n;
  const growth = (1 + r) ** n;
  return (principal * r * growth) / (growth - 1);
};

export const remainingLoanBalance = (
  principal: number,
  annualRate: number,
  termYears: number,
  yearsElapsed: number
): number => {
  if (principal <= 0) return 0;
  const n = Math.round(termYears * 12);
  const p = Math.round(yearsElapsed * 12);
  if (p >= n) return 0;
  const r = annualRate / 12;
  if (r === 0) return principal * (1 - p / n);
  return (principal * ((1 + r) ** n - (1 + r) ** p)) / ((1 + r) ** n - 1);
};

export const dscrLabel = (dscr: number | null): string => {
  if (dscr === null) return 'N/A (no loan)';
  if (dscr >= 1.5) return 'Excellent (lender-safe)';
  if (dscr >= 1.25) return 'Good (lender threshold)';
  if (dscr >= 1.0) return 'Marginal (tight)';
  return 'Shortfall (income below debt service)';
};

export const rateQuality = (
  cashOnCash: number | null,
  dscr: number | null,
  annualCashFlow: number
): InvestmentQuality => {
  if (annualCashFlow < 0) return 'NEGATIVE_CASH_FLOW';
  const coc = cashOnCash ?? 0;
  const coverage = dscr ?? Number.POSITIVE_INFINITY;
  if (coc > 0.12 && coverage >= 1.25) return 'STRONG';
  if (coc > 0.08 && coverage >= 1.0) return 'MODERATE';
  if (coc > 0.05) return 'FAIR';
  return 'WEAK';
};

export const RECOMMENDATIONS: Record<InvestmentQuality, InvestmentRecommendation> = {
  NEGATIVE_CASH_FLOW: 'AVOID',
  STRONG: 'STRONG BUY',
  MODERATE: 'BUY',
  FAIR: 'HOLD / NEGOTIATE',
  WEAK: 'AVOID / RENEGOTIATE',
};

/** Monthly rent against 1% of the price. */
export const onePercentRuleVerdict = (ratio: number): OnePercentRuleVerdict => {
  if (ratio >= 1) return 'PASSES';
  if (ratio >= 0.75) return 'CLOSE';
  return 'FAILS';
};

const solveIrrOrNull = (cashFlows: number[], config: FinancialConfig) => {
  try {
    const { rate, iterations } = solveIrrWithFallbacks(
      cashFlows,
      config.irr,
      config.fallbackGuesses
    );
    return { irr: rate, irrIterations: iterations, irrError: null };
  } catch (error) {
    if (!(error instanceof NonConvergenceError)) throw error;
    return { irr: null, irrIterations: null, irrError: toErrorPayload(error) };
  }
};

export const buildCashFlowSeries = (
  totalCashInvested: number,
  annualCashFlow: number,
  netSaleProceeds: number,
  holdingYears: number
): number[] => {
  const series = [-totalCashInvested];
  for (let year = 1; year <= holdingYears; year += 1) {
    series.push(
      year === holdingYears ? annualCashFlow + netSaleProceeds : annualCashFlow
    );
  }
  return series;
};

export const computeInvestmentMetrics = (
  params: InvestmentParameters,
  config: FinancialConfig = DEFAULT_FINANCIAL_CONFIG
): InvestmentMetrics => {
  assertInvestmentParameters(params);
  const { purchasePrice: price, loan, exit } = params;

  const payment = monthlyLoanPayment(loan.principal, loan.annualRate, loan.termYears);
  const annualDebtService = payment * 12;
  const grossPotentialRent = params.monthlyRent * 12;
  const netOperatingIncome = grossPotentialRent - params.annualOperatingExpenses;
  const annualCapexReserve = price * params.capexReserveRate;
  const annualCashFlow = netOperatingIncome - annualDebtService - annualCapexReserve;
  const totalCashInvested = price - loan.principal + price * params.closingCostRate;

  const dscr = annualDebtService > 0 ? netOperatingIncome / annualDebtService : null;
  const cashOnCash = totalCashInvested > 0 ? annualCashFlow / totalCashInvested : null;

  const breakEvenOccupancyRaw =
    grossPotentialRent > 0
      ? (params.annualOperatingExpenses + annualDebtService) / grossPotentialRent
      : null;
  const breakEvenOccupancy =
    breakEvenOccupancyRaw === null
      ? 1
      : Math.min(1, Math.max(0, breakEvenOccupancyRaw));

  const futureValue = price * (1 + exit.appreciationRate) ** params.holdingYears;
  const loanBalanceAtExit = remainingLoanBalance(
    loan.principal,
    loan.annualRate,
    loan.termYears,
    params.holdingYears
  );
  const netSaleProceeds =
    futureValue - futureValue * exit.saleCostRate - loanBalanceAtExit;

  const cashFlows = buildCashFlowSeries(
    totalCashInvested,
    annualCashFlow,
    netSaleProceeds,
    params.holdingYears
  );
  const onePercentRuleRatio = params.monthlyRent / (price * 0.01);
  const quality = rateQuality(cashOnCash, dscr, annualCashFlow);

  return {
    totalCashInvested,
    monthlyLoanPayment: payment,
    annualDebtService,
    grossPotentialRent,
    netOperatingIncome,
    annualCapexReserve,
    annualCashFlow,
    monthlyCashFlow: annualCashFlow / 12,
    dscr,
    dscrLabel: dscrLabel(dscr),
    cashOnCash,
    breakEvenOccupancy,
    breakEvenOccupancyRaw,
    grossYield: grossPotentialRent / price,
    capRate: netOperatingIncome / price,
    paybackYears: annualCashFlow > 0 ? totalCashInvested / annualCashFlow : null,
    onePercentRuleRatio,
    onePercentRuleVerdict: onePercentRuleVerdict(onePercentRuleRatio),
    futureValue,
    equityGain: futureValue - price,
    loanBalanceAtExit,
    netSaleProceeds,
    cashFlows,
    ...solveIrrOrNull(cashFlows, config),
    quality,
    recommendation: RECOMMENDATIONS[quality],
  };
};
