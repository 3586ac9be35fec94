import { AnalysisError, ProviderError, describeError } from '../errors';

export type FetchLike = typeof fetch;

interface RequestOptions {
  provider: string;
  fetchImpl: FetchLike;
  init?: RequestInit;
}

const send = async (
  url: string,
  { provider, fetchImpl, init }: RequestOptions
): Promise<Response> => {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    if (error instanceof AnalysisError) throw error;
    throw new ProviderError(provider, `Request failed: ${describeError(error)}`, {
      url,
    });
  }
  if (!response.ok) {
    throw new ProviderError(
      provider,
      `Upstream responded ${response.status} ${response.statusText}`.trim(),
      { url, status: response.status }
    );
  }
  return response;
};

export const requestJson = async (
  url: string,
  options: RequestOptions
): Promise<unknown> => {
  const response = await send(url, options);
  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(
      options.provider,
      `Response was not valid JSON: ${describeError(error)}`,
      { url }
    );
  }
};

export const requestBytes = async (
  url: string,
  options: RequestOptions
): Promise<Buffer> => {
  const response = await send(url, options);
  return Buffer.from(await response.arrayBuffer());
};

/** Replaces `{name}` placeholders with URL-encoded values. */
export const fillTemplate = (
  template: string,
  values: Record<string, string | number>
): string =>
  template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : encodeURIComponent(String(value));
  });
