import sharp from 'sharp';
import { InvalidImageError, describeError } from '../errors';
import type { Raster } from './vegetation';

// Decodes PNG/JPEG/WebP/etc. into interleaved 8-bit RGB.
export const decodeRaster = async (bytes: Uint8Array): Promise<Raster> => {
  if (!bytes.length) {
    throw new InvalidImageError('Image data is empty');
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes)
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new InvalidImageError(`Image could not be decoded: ${describeError(error)}`, {
      byteLength: bytes.length,
    });
  }

  const { width, height, channels } = decoded.info;
  if (!width || !height) {
    throw new InvalidImageError('Image has zero area', { width, height });
  }
  if (channels !== 3) {
    throw new InvalidImageError(`Unsupported channel count ${channels}`);
  }

  return { width, height, channels, data: decoded.data };
};
