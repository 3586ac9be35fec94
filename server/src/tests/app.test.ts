import { createApp } from '../app';
import { DEFAULT_SCORING_CONFIG } from '../config';
import { silentLogger } from '../logger';
import { isRecord } from '../service/analysisInput';
import { createPropertyImageIngestion } from '../service/propertyIngestion';
import {
  baseInput,
  buildFakes,
  buildOrchestrator,
  solidPng,
} from './fixtures/analysisFakes';

const jsonHeaders = {
  'Content-Type': 'application/json',
};

let tilePng: Buffer;

beforeAll(async () => {
  tilePng = await solidPng(8, 8, { r: 0, g: 200, b: 0 });
});

const setup = () => {
  const fakes = buildFakes(tilePng);
  const { orchestrator, deps } = buildOrchestrator(fakes);
  const app = createApp({
    orchestrator,
    similarityIndex: deps.similarityIndex,
    ingestion: createPropertyImageIngestion({
      embeddingModel: deps.embeddingModel,
      similarityIndex: deps.similarityIndex,
    }),
    scoring: DEFAULT_SCORING_CONFIG,
    corsOrigins: ['http://localhost:5173'],
    logger: silentLogger,
  });
  return { app, fakes, deps };
};

const pollUntilTerminal = async (
  app: ReturnType<typeof setup>['app'],
  jobId: string
): Promise<string> => {
  for (let i = 0; i < 200; i += 1) {
    const body: unknown = await (await app.request(`/api/v1/analyses/${jobId}`)).json();
    if (isRecord(body) && (body.status === 'SUCCESS' || body.status === 'FAILURE')) {
      return body.status;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error(`job ${jobId} did not finish`);
};

describe('APIサーバー全体', () => {
  test('ルートはサーバー名を返す', async () => {
    const { app } = setup();

    const response = await app.request('/');

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('Site Insight API Server');
  });

  test('解析を投入し、完了後にレポートを取得できる', async () => {
    const { app } = setup();

    const submitted = await app.request('/api/v1/analyses', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify(baseInput()),
    });
    expect(submitted.status).toBe(202);
    const submittedBody: unknown = await submitted.json();
    if (!isRecord(submittedBody) || typeof submittedBody.jobId !== 'string') {
      throw new Error('jobId missing');
    }
    const { jobId } = submittedBody;

    expect(await pollUntilTerminal(app, jobId)).toBe('SUCCESS');

    const result = await app.request(`/api/v1/analyses/${jobId}/result`);
    expect(result.status).toBe(200);
    expect(await result.json()).toMatchObject({
      address: '1 Test Street',
      degraded: false,
      missingSections: [],
      sections: {
        walkScore: { available: true, data: { score: 22.5 } },
        vegetation: { available: true, data: { coverage: 1 } },
        financial: { available: false, reason: 'no investment parameters supplied' },
      },
    });
  });

  test('投資指標: 金額表記を受け付けて指標を返す', async () => {
    const { app } = setup();

    const response = await app.request('/api/v1/investments/metrics', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({
        purchasePrice: '10L',
        monthlyRent: 10000,
        annualOperatingExpenses: 30000,
        downPaymentRate: 1,
      }),
    });

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      parameters: { purchasePrice: 1_000_000, loan: { principal: 0 } },
      metrics: {
        totalCashInvested: 1_070_000,
        annualCashFlow: 80_000,
        dscr: null,
        dscrLabel: 'N/A (no loan)',
        breakEvenOccupancy: 0.25,
        quality: 'FAIR',
        recommendation: 'HOLD / NEGOTIATE',
        irrError: null,
      },
    });
    const irr =
      isRecord(body) && isRecord(body.metrics) ? body.metrics.irr : undefined;
    expect(typeof irr === 'number' ? irr : Number.NaN).toBeCloseTo(0.1065287, 6);
  });

  test('投資指標: 入力不正は 400、IRR 未収束でも 200 で irr は null', async () => {
    const { app } = setup();

    const invalid = await app.request('/api/v1/investments/metrics', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ purchasePrice: 0, monthlyRent: 1000 }),
    });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({
      error: 'purchasePrice must be greater than zero',
      code: 'PARSE_ERROR',
    });

    const divergent = await app.request('/api/v1/investments/metrics', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({
        purchasePrice: 1_000_000,
        monthlyRent: 0,
        downPaymentRate: 1,
        holdingYears: 1,
        capexReserveRate: 0,
        exit: { appreciationRate: 0, saleCostRate: 1 },
      }),
    });
    expect(divergent.status).toBe(200);
    expect(await divergent.json()).toMatchObject({
      metrics: {
        totalCashInvested: 1_070_000,
        irr: null,
        irrIterations: null,
        irrError: { code: 'NON_CONVERGENCE' },
      },
    });

    const tooShortLoan = await app.request('/api/v1/investments/metrics', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({
        purchasePrice: 1_000_000,
        monthlyRent: 10_000,
        loan: { termYears: 0.01 },
      }),
    });
    expect(tooShortLoan.status).toBe(400);
    expect(await tooShortLoan.json()).toEqual({
      error: 'loan.termYears must cover at least one monthly payment when borrowing',
      code: 'PARSE_ERROR',
    });
  });

  test('類似検索: 登録・検索・削除・統計', async () => {
    const { app } = setup();

    const put = await app.request('/api/v1/similarity/properties/p-1', {
      method: 'PUT',
      headers: jsonHeaders,
      body: JSON.stringify({ vector: [1, 0, 0] }),
    });
    expect(put.status).toBe(200);
    expect(await put.json()).toEqual({ propertyId: 'p-1', dimension: 3 });

    const search = await app.request('/api/v1/similarity/search', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ vector: [1, 0, 0], threshold: 0.5 }),
    });
    expect(search.status).toBe(200);
    expect(await search.json()).toEqual({
      matches: [{ propertyId: 'p-1', similarity: 1, metadata: {} }],
    });

    const stats = await app.request('/api/v1/similarity/stats');
    expect(await stats.json()).toEqual({ dimension: 3, size: 1 });

    const removed = await app.request('/api/v1/similarity/properties/p-1', {
      method: 'DELETE',
    });
    expect(await removed.json()).toEqual({ propertyId: 'p-1', removed: true });

    const removedAgain = await app.request('/api/v1/similarity/properties/p-1', {
      method: 'DELETE',
    });
    expect(removedAgain.status).toBe(404);
  });

  test('類似検索: 次元違いは 422、しきい値不正は 400', async () => {
    const { app } = setup();

    const mismatch = await app.request('/api/v1/similarity/properties/p-1', {
      method: 'PUT',
      headers: jsonHeaders,
      body: JSON.stringify({ vector: [1, 0] }),
    });
    expect(mismatch.status).toBe(422);
    expect(await mismatch.json()).toEqual({
      error: 'Embedding dimension mismatch: expected 3, got 2',
      code: 'DIMENSION_MISMATCH',
      details: { expected: 3, received: 2 },
    });

    const badThreshold = await app.request('/api/v1/similarity/search', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ vector: [1, 0, 0], threshold: 2 }),
    });
    expect(badThreshold.status).toBe(400);
    expect(await badThreshold.json()).toEqual({
      error: 'threshold must be between -1 and 1',
      code: 'PARSE_ERROR',
      details: null,
    });
  });

  test('類似検索: 画像で登録して画像で検索できる', async () => {
    const { app, fakes } = setup();

    const ingest = await app.request('/api/v1/similarity/properties/p-9/image?source=upload', {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: new Uint8Array([1, 2, 3]),
    });
    expect(ingest.status).toBe(201);
    expect(await ingest.json()).toEqual({ propertyId: 'p-9', dimension: 3 });
    expect(fakes.embed).toHaveBeenCalledTimes(1);

    const search = await app.request('/api/v1/similarity/search-by-image?limit=1', {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: new Uint8Array([4, 5, 6]),
    });
    expect(search.status).toBe(200);
    expect(await search.json()).toEqual({
      matches: [{ propertyId: 'p-9', similarity: 1, metadata: { source: 'upload' } }],
    });

    const empty = await app.request('/api/v1/similarity/search-by-image', {
      method: 'POST',
    });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ code: 'INVALID_IMAGE' });
  });
});
