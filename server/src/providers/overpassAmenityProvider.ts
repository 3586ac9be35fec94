// src/providers/overpassAmenityProvider.ts
//
// 目的:
// - OpenStreetMap（Overpass API）から周辺施設を取得し、AmenityRecord（カテゴリ＋距離）に変換する。
// - OSM タグ → カテゴリの対応表は osmCategoryTags.json。対応表にないタグの要素は捨てる。
import { ProviderError } from '../errors';
import {
  isAmenityCategory,
  type AmenityCategory,
  type AmenityProvider,
  type AmenityRecord,
  type GeoPoint,
} from '../model/providers';
import { requestJson, type FetchLike } from './http';
import osmCategoryTags from './osmCategoryTags.json';

interface OverpassAmenityProviderOptions {
  baseUrl: string;
  userAgent: string;
  fetchImpl?: FetchLike;
  /** Overpass server-side timeout in seconds. */
  queryTimeoutSec?: number;
}

export type TagTable = Map<string, Map<string, AmenityCategory>>;

export const buildTagTable = (
  source: Record<string, Record<string, string>> = osmCategoryTags
): TagTable => {
  const table: TagTable = new Map();
  for (const [key, values] of Object.entries(source)) {
    const mapping = new Map<string, AmenityCategory>();
    for (const [value, category] of Object.entries(values)) {
      if (isAmenityCategory(category)) {
        mapping.set(value, category);
      }
    }
    table.set(key, mapping);
  }
  return table;
};

const EARTH_RADIUS_M = 6_371_000;
const toRad = (deg: number) => (deg * Math.PI) / 180;

export const haversineDistanceM = (a: GeoPoint, b: GeoPoint): number => {
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
};

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const buildOverpassQuery = (
  point: GeoPoint,
  radiusM: number,
  table: TagTable,
  timeoutSec = 25
): string => {
  const around = `around:${Math.round(radiusM)},${point.lat},${point.lon}`;
  const clauses = [...table.entries()]
    .filter(([, values]) => values.size > 0)
    .map(([key, values]) => {
      const pattern = [...values.keys()].map(escapeRegex).join('|');
      return `  nwr(${around})["${key}"~"^(${pattern})$"];`;
    });
  return [`[out:json][timeout:${timeoutSec}];`, '(', ...clauses, ');', 'out center tags;'].join(
    '\n'
  );
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readPoint = (element: Record<string, unknown>): GeoPoint | null => {
  const source = isObject(element.center) ? element.center : element;
  const { lat, lon } = source;
  return typeof lat === 'number' && typeof lon === 'number' ? { lat, lon } : null;
};

const classify = (
  tags: Record<string, unknown>,
  table: TagTable
): AmenityCategory | null => {
  for (const [key, values] of table) {
    const tagValue = tags[key];
    if (typeof tagValue !== 'string') continue;
    const category = values.get(tagValue);
    if (category) return category;
  }
  return null;
};

export const parseOverpassElements = (
  payload: unknown,
  origin: GeoPoint,
  table: TagTable
): AmenityRecord[] => {
  if (!isObject(payload) || !Array.isArray(payload.elements)) {
    throw new ProviderError('overpass', 'Unexpected Overpass response shape');
  }

  const records: AmenityRecord[] = [];
  for (const element of payload.elements) {
    if (!isObject(element) || !isObject(element.tags)) continue;
    const category = classify(element.tags, table);
    const point = readPoint(element);
    if (!category || !point) continue;

    const record: AmenityRecord = {
      category,
      distanceM: Math.round(haversineDistanceM(origin, point)),
    };
    if (typeof element.tags.name === 'string') {
      record.name = element.tags.name;
    }
    records.push(record);
  }
  return records;
};

export const createOverpassAmenityProvider = ({
  baseUrl,
  userAgent,
  fetchImpl = fetch,
  queryTimeoutSec = 25,
}: OverpassAmenityProviderOptions): AmenityProvider => {
  const table = buildTagTable();

  return {
    async fetchAmenities(point, radiusM, signal) {
      const query = buildOverpassQuery(point, radiusM, table, queryTimeoutSec);
      const payload = await requestJson(baseUrl, {
        provider: 'overpass',
        fetchImpl,
        init: {
          method: 'POST',
          headers: {
            'User-Agent': userAgent,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: new URLSearchParams({ data: query }).toString(),
          signal,
        },
      });
      return parseOverpassElements(payload, point, table);
    },
  };
};
