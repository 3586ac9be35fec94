#!/usr/bin/env node
import process from 'node:process';
import { AnalysisError } from '../errors';
import type { InvestmentMetrics } from '../model/investment';
import { computeInvestmentMetrics } from '../scoring/financial';
import { parseInvestmentParameters } from '../service/analysisInput';

const getArgValue = (flag: string): string | undefined => {
  const index = process.argv.indexOf(flag);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const printUsageAndExit = (message?: string, code = 1): never => {
  if (message) console.error(message);
  console.info(
    'Usage: npm run investment:report -- --price <AMOUNT> --rent <MONTHLY_AMOUNT> [--expenses <ANNUAL_AMOUNT>] [--loan <AMOUNT>] [--down <RATE>] [--rate <RATE>] [--term <YEARS>] [--hold <YEARS>] [--appreciation <RATE>] [--json]'
  );
  console.info('Amounts accept magnitude suffixes, e.g. 50L, 1.2cr, Rs. 45,00,000');
  process.exit(code);
};

const optionalNumber = (flag: string): number | undefined => {
  const raw = getArgValue(flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    printUsageAndExit(`${flag} must be a number`);
  }
  return value;
};

export const formatMetricsTable = (metrics: InvestmentMetrics): string => {
  const money = (value: number) =>
    value.toLocaleString('en-IN', { maximumFractionDigits: 0 });
  const pct = (value: number | null) =>
    value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`;

  const rows: Array<[string, string]> = [
    ['Total cash invested', money(metrics.totalCashInvested)],
    ['Monthly loan payment', money(metrics.monthlyLoanPayment)],
    ['Net operating income', money(metrics.netOperatingIncome)],
    ['Annual cash flow', money(metrics.annualCashFlow)],
    ['Monthly cash flow', money(metrics.monthlyCashFlow)],
    ['DSCR', metrics.dscr === null ? metrics.dscrLabel : `${metrics.dscr.toFixed(2)} (${metrics.dscrLabel})`],
    ['Cash-on-cash', pct(metrics.cashOnCash)],
    ['Cap rate', pct(metrics.capRate)],
    ['Gross yield', pct(metrics.grossYield)],
    ['Break-even occupancy', pct(metrics.breakEvenOccupancy)],
    ['1% rule', `${metrics.onePercentRuleRatio.toFixed(2)}x (${metrics.onePercentRuleVerdict})`],
    ['Payback (years)', metrics.paybackYears === null ? 'n/a' : metrics.paybackYears.toFixed(1)],
    ['Equity gain', money(metrics.equityGain)],
    ['Net sale proceeds', money(metrics.netSaleProceeds)],
    ['IRR', metrics.irr === null ? 'N/A (no convergence)' : pct(metrics.irr)],
    ['Quality', `${metrics.quality} (${metrics.recommendation})`],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`).join('\n');
};

const main = () => {
  const price = getArgValue('--price');
  const rent = getArgValue('--rent');
  if (!price || !rent) {
    printUsageAndExit('--price and --rent are required');
  }

  const raw = {
    purchasePrice: price,
    monthlyRent: rent,
    annualOperatingExpenses: getArgValue('--expenses'),
    downPaymentRate: optionalNumber('--down'),
    loan: {
      principal: getArgValue('--loan'),
      annualRate: optionalNumber('--rate'),
      termYears: optionalNumber('--term'),
    },
    holdingYears: optionalNumber('--hold'),
    exit: { appreciationRate: optionalNumber('--appreciation') },
  };

  try {
    const params = parseInvestmentParameters(raw);
    const metrics = computeInvestmentMetrics(params);
    if (process.argv.includes('--json')) {
      console.info(JSON.stringify({ parameters: params, metrics }, null, 2));
    } else {
      console.info(formatMetricsTable(metrics));
    }
  } catch (error) {
    if (error instanceof AnalysisError) {
      printUsageAndExit(`[${error.code}] ${error.message}`);
    }
    throw error;
  }
};

if (require.main === module) {
  main();
}
