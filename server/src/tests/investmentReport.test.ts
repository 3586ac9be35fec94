import { computeInvestmentMetrics } from '../scoring/financial';
import { formatMetricsTable } from '../scripts/investmentReport';
import { TEST_INVESTMENT } from './fixtures/analysisFakes';

describe('investmentReport CLI の表形式出力', () => {
  test('ラベルを揃えて金額はインド式の桁区切りで出す', () => {
    const lines = formatMetricsTable(computeInvestmentMetrics(TEST_INVESTMENT)).split('\n');

    expect(lines).toHaveLength(16);
    expect(lines[0]).toBe('Total cash invested   10,70,000');
    expect(lines[1]).toBe('Monthly loan payment  0');
    expect(lines[4]).toBe('Monthly cash flow     6,667');
    expect(lines).toContain('DSCR                  N/A (no loan)');
    expect(lines).toContain('1% rule               1.00x (PASSES)');
    expect(lines).toContain('IRR                   10.65%');
    expect(lines[15]).toBe('Quality               FAIR (HOLD / NEGOTIATE)');
  });

  test('IRR が求まらない場合はその旨を出し、他の行は残す', () => {
    const metrics = computeInvestmentMetrics({
      ...TEST_INVESTMENT,
      monthlyRent: 0,
      annualOperatingExpenses: 0,
      capexReserveRate: 0,
      holdingYears: 1,
      exit: { appreciationRate: 0, saleCostRate: 1 },
    });

    const lines = formatMetricsTable(metrics).split('\n');

    expect(lines).toHaveLength(16);
    expect(lines[0]).toBe('Total cash invested   10,70,000');
    expect(lines).toContain('IRR                   N/A (no convergence)');
    expect(lines[15]).toBe('Quality               WEAK (AVOID / RENEGOTIATE)');
  });
});
