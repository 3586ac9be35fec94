// src/scoring/irr.ts
//
// 目的:
// - キャッシュフロー列の内部収益率（IRR）をニュートン法で求める。
// - 収束判定・許容誤差・反復上限は呼び出し側の設定で決まり、未収束なら値を返さず例外にする。
import { NonConvergenceError } from '../errors';

export interface IrrOptions {
  initialGuess: number;
  /** Absolute |NPV| below which the rate is accepted. */
  tolerance: number;
  maxIterations: number;
}

export interface IrrSolution {
  rate: number;
  iterations: number;
  npv: number;
}

export const DEFAULT_IRR_OPTIONS: IrrOptions = {
  initialGuess: 0.1,
  tolerance: 1e-6,
  maxIterations: 100,
};

const DERIVATIVE_EPSILON = 1e-12;

export const npv = (rate: number, cashFlows: readonly number[]): number =>
  cashFlows.reduce((sum, cf, n) => sum + cf / (1 + rate) ** n, 0);

export const npvDerivative = (rate: number, cashFlows: readonly number[]): number =>
  cashFlows.reduce((sum, cf, n) => sum - (n * cf) / (1 + rate) ** (n + 1), 0);

const hasSignChange = (cashFlows: readonly number[]) => {
  const nonZero = cashFlows.filter((cf) => cf !== 0);
  return nonZero.some((cf) => Math.sign(cf) !== Math.sign(nonZero[0]));
};

export const solveIrr = (
  cashFlows: readonly number[],
  options: IrrOptions = DEFAULT_IRR_OPTIONS
): IrrSolution => {
  if (cashFlows.length < 2 || !cashFlows.every(Number.isFinite)) {
    throw new NonConvergenceError(
      'IRR needs at least two finite cash flows',
      { length: cashFlows.length }
    );
  }
  if (!hasSignChange(cashFlows)) {
    throw new NonConvergenceError(
      'Cash flows never change sign; no rate zeroes the NPV'
    );
  }

  let rate = options.initialGuess;
  for (let iteration = 0; iteration <= options.maxIterations; iteration += 1) {
    if (!Number.isFinite(rate) || rate <= -1) {
      throw new NonConvergenceError('IRR iteration left the domain r > -1', {
        rate,
        iteration,
        initialGuess: options.initialGuess,
      });
    }

    const value = npv(rate, cashFlows);
    if (Math.abs(value) < options.tolerance) {
      return { rate, iterations: iteration, npv: value };
    }
    if (iteration === options.maxIterations) break;

    const slope = npvDerivative(rate, cashFlows);
    if (Math.abs(slope) < DERIVATIVE_EPSILON) {
      throw new NonConvergenceError('NPV derivative vanished', {
        rate,
        iteration,
        initialGuess: options.initialGuess,
      });
    }
    rate -= value / slope;
  }

  throw new NonConvergenceError(
    `IRR did not converge within ${options.maxIterations} iterations`,
    { initialGuess: options.initialGuess, lastRate: rate }
  );
};

/** Tries `initialGuess`, then each fallback, returning the first converged root. */
export const solveIrrWithFallbacks = (
  cashFlows: readonly number[],
  options: IrrOptions,
  fallbackGuesses: readonly number[]
): IrrSolution => {
  let lastError: NonConvergenceError | undefined;
  for (const guess of [options.initialGuess, ...fallbackGuesses]) {
    try {
      return solveIrr(cashFlows, { ...options, initialGuess: guess });
    } catch (error) {
      if (!(error instanceof NonConvergenceError)) throw error;
      lastError = error;
    }
  }
  throw lastError ?? new NonConvergenceError('IRR did not converge');
};
