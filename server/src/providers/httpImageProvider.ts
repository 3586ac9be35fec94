import { InvalidImageError } from '../errors';
import type { ImageProvider, ImageTarget } from '../model/providers';
import { fillTemplate, requestBytes, type FetchLike } from './http';

interface HttpImageProviderOptions {
  /** e.g. `https://tiles.example/{lat}/{lon}?radius={radius}` */
  tileUrlTemplate: string;
  /** e.g. `https://listings.example/{propertyId}/photo` */
  propertyImageUrlTemplate: string;
  userAgent: string;
  fetchImpl?: FetchLike;
}

export const resolveImageUrl = (
  target: ImageTarget,
  options: Pick<HttpImageProviderOptions, 'tileUrlTemplate' | 'propertyImageUrlTemplate'>
): string =>
  target.kind === 'tile'
    ? fillTemplate(options.tileUrlTemplate, {
        lat: target.point.lat,
        lon: target.point.lon,
        radius: Math.round(target.radiusM),
      })
    : fillTemplate(options.propertyImageUrlTemplate, {
        propertyId: target.propertyId,
      });

export const createHttpImageProvider = (
  options: HttpImageProviderOptions
): ImageProvider => {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async fetchImage(target, signal) {
      const url = resolveImageUrl(target, options);
      const bytes = await requestBytes(url, {
        provider: target.kind === 'tile' ? 'tile-imagery' : 'property-imagery',
        fetchImpl,
        init: { headers: { 'User-Agent': options.userAgent }, signal },
      });
      if (!bytes.length) {
        throw new InvalidImageError('Image provider returned an empty body', {
          url,
        });
      }
      return bytes;
    },
  };
};
