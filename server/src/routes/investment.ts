import type { Hono } from 'hono';
import { ParseError } from '../errors';
import type { InvestmentMetrics, InvestmentParameters } from '../model/investment';
import { parseInvestmentParameters } from '../service/analysisInput';
import { readJsonBody } from './analysis';

interface RegisterInvestmentRoutesOptions {
  computeMetrics: (params: InvestmentParameters) => InvestmentMetrics;
}

export const registerInvestmentRoutes = (
  app: Hono,
  options: RegisterInvestmentRoutesOptions
) => {
  app.post('/api/v1/investments/metrics', async (c) => {
    try {
      const params = parseInvestmentParameters(await readJsonBody(c.req.raw));
      const metrics = options.computeMetrics(params);
      return c.json({ parameters: params, metrics });
    } catch (error) {
      if (error instanceof ParseError) {
        return c.json({ error: error.message, code: error.code }, 400);
      }
      throw error;
    }
  });
};
