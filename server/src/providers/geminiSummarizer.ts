import { GoogleGenAI } from '@google/genai';
import { ProviderError, describeError } from '../errors';
import type { Summarizer, SummaryFacts } from '../model/providers';

/** The slice of the Gemini client the summarizer calls. */
export interface GenerateContentClient {
  models: {
    generateContent(params: {
      model: string;
      contents: string;
      config?: { abortSignal?: AbortSignal; temperature?: number };
    }): Promise<{ text?: string }>;
  };
}

interface GeminiSummarizerOptions {
  model: string;
  apiKey?: string;
  client?: GenerateContentClient;
}

const percent = (value: number | null) =>
  value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;

export const buildSummaryPrompt = (facts: SummaryFacts): string => {
  const investment = facts.investment
    ? [
        `- IRR: ${facts.investment.irr === null ? 'n/a (no convergence)' : percent(facts.investment.irr)}`,
        `- DSCR: ${facts.investment.dscr === null ? 'n/a (no loan)' : facts.investment.dscr.toFixed(2)}`,
        `- Cash-on-cash: ${percent(facts.investment.cashOnCash)}`,
        `- Cap rate: ${percent(facts.investment.capRate)}`,
        `- Break-even occupancy: ${percent(facts.investment.breakEvenOccupancy)}`,
        `- Verdict: ${facts.investment.quality}`,
      ].join('\n')
    : '- not analysed';
  const similar = facts.similarProperties.length
    ? facts.similarProperties
        .map((match) => `- ${match.propertyId} (${match.similarity.toFixed(3)})`)
        .join('\n')
    : '- none';

  return `You are a real-estate location analyst. Write a concise summary (at most 150 words)
of the site below for a prospective buyer. Use only the figures given; do not invent numbers.

Address: ${facts.address}
Coordinates: ${facts.location.lat.toFixed(5)}, ${facts.location.lon.toFixed(5)}
Walk score: ${facts.walkScore === null ? 'n/a' : `${facts.walkScore}/100`}
Walk score contributions: ${JSON.stringify(facts.walkBreakdown)}
Vegetation coverage: ${percent(facts.vegetationCoverage)}

Investment:
${investment}

Visually similar listings:
${similar}`;
};

export const createGeminiSummarizer = ({
  model,
  apiKey,
  client,
}: GeminiSummarizerOptions): Summarizer => {
  const ai: GenerateContentClient = client ?? new GoogleGenAI({ apiKey });

  return {
    async summarize(facts, signal) {
      let text: string | undefined;
      try {
        const response = await ai.models.generateContent({
          model,
          contents: buildSummaryPrompt(facts),
          config: { abortSignal: signal, temperature: 0.2 },
        });
        text = response.text;
      } catch (error) {
        throw new ProviderError('gemini', `Summary generation failed: ${describeError(error)}`);
      }
      if (!text?.trim()) {
        throw new ProviderError('gemini', 'Model returned an empty summary');
      }
      return text.trim();
    },
  };
};
