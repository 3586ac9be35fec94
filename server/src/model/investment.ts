// src/model/investment.ts
//
// 目的:
// - 投資指標計算の入力・出力の型。金利・率はすべて小数（0.08 = 8%）。
import type { ErrorPayload } from '../errors';

export interface LoanTerms {
  principal: number;
  annualRate: number;
  termYears: number;
}

export interface ExitAssumptions {
  appreciationRate: number;
  saleCostRate: number;
}

export interface InvestmentParameters {
  purchasePrice: number;
  monthlyRent: number;
  annualOperatingExpenses: number;
  loan: LoanTerms;
  holdingYears: number;
  exit: ExitAssumptions;
  closingCostRate: number;
  capexReserveRate: number;
}

export type InvestmentQuality =
  | 'NEGATIVE_CASH_FLOW'
  | 'STRONG'
  | 'MODERATE'
  | 'FAIR'
  | 'WEAK';

export type InvestmentRecommendation =
  | 'AVOID'
  | 'STRONG BUY'
  | 'BUY'
  | 'HOLD / NEGOTIATE'
  | 'AVOID / RENEGOTIATE';

export type OnePercentRuleVerdict = 'PASSES' | 'CLOSE' | 'FAILS';

export interface InvestmentMetrics {
  totalCashInvested: number;
  monthlyLoanPayment: number;
  annualDebtService: number;
  grossPotentialRent: number;
  netOperatingIncome: number;
  annualCapexReserve: number;
  annualCashFlow: number;
  monthlyCashFlow: number;
  /** `null` when there is no debt service. */
  dscr: number | null;
  dscrLabel: string;
  /** `null` when nothing was invested. */
  cashOnCash: number | null;
  breakEvenOccupancy: number;
  /** Unclamped ratio; `null` when gross potential rent is zero. */
  breakEvenOccupancyRaw: number | null;
  grossYield: number;
  capRate: number;
  paybackYears: number | null;
  /** Monthly rent divided by 1% of the purchase price. */
  onePercentRuleRatio: number;
  onePercentRuleVerdict: OnePercentRuleVerdict;
  futureValue: number;
  equityGain: number;
  loanBalanceAtExit: number;
  netSaleProceeds: number;
  cashFlows: number[];
  /** `null` when the root-finder did not converge; see `irrError`. */
  irr: number | null;
  irrIterations: number | null;
  irrError: ErrorPayload | null;
  quality: InvestmentQuality;
  recommendation: InvestmentRecommendation;
}
