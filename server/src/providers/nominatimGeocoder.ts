import { ParseError, ProviderError } from '../errors';
import type { GeoPoint, Geocoder } from '../model/providers';
import { requestJson, type FetchLike } from './http';

interface NominatimGeocoderOptions {
  baseUrl: string;
  userAgent: string;
  fetchImpl?: FetchLike;
}

const toCoordinate = (value: unknown): number | null => {
  const parsed =
    typeof value === 'string' ? Number(value) : typeof value === 'number' ? value : NaN;
  return Number.isFinite(parsed) ? parsed : null;
};

export const parseNominatimResponse = (
  payload: unknown,
  address: string
): GeoPoint => {
  if (!Array.isArray(payload)) {
    throw new ProviderError('nominatim', 'Unexpected geocoder response shape');
  }
  const first: unknown = payload[0];
  if (first === undefined) {
    throw new ParseError(`Address could not be resolved: "${address}"`, {
      address,
    });
  }
  if (typeof first !== 'object' || first === null) {
    throw new ProviderError('nominatim', 'Geocoder result is not an object');
  }
  const lat = toCoordinate('lat' in first ? first.lat : undefined);
  const lon = toCoordinate('lon' in first ? first.lon : undefined);
  if (lat === null || lon === null) {
    throw new ProviderError('nominatim', 'Geocoder result lacks coordinates');
  }
  return { lat, lon };
};

export const createNominatimGeocoder = ({
  baseUrl,
  userAgent,
  fetchImpl = fetch,
}: NominatimGeocoderOptions): Geocoder => ({
  async geocode(address: string, signal?: AbortSignal): Promise<GeoPoint> {
    const url = new URL(baseUrl);
    url.searchParams.set('q', address);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');

    const payload = await requestJson(url.toString(), {
      provider: 'nominatim',
      fetchImpl,
      init: {
        headers: { 'User-Agent': userAgent, Accept: 'application/json' },
        signal,
      },
    });
    return parseNominatimResponse(payload, address);
  },
});
