// src/scoring/vegetation.ts
//
// 目的:
// - ラスター画像（RGB/RGBA 8bit）から植生ピクセル比率を推定する純関数。
// 手順:
// - 各ピクセルを HSV に変換し、色相が緑帯域・彩度/明度が下限以上なら植生と判定。
// - 正方形の構造要素でオープニング（収縮→膨張）をかけ、孤立ピクセルの誤検出を除く。
// - 画像外の近傍は無視する（境界で収縮が進まない）。
import { InvalidImageError } from '../errors';

export interface Raster {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Uint8Array;
}

export interface VegetationConfig {
  /** Inclusive hue band in degrees [0, 360). */
  hueMin: number;
  hueMax: number;
  /** Saturation floor in [0, 1]; excludes washed-out pixels. */
  minSaturation: number;
  /** Value floor in [0, 1]; excludes shadowed pixels. */
  minValue: number;
  /** Side of the square structuring element; 1 disables the opening. */
  openingKernelSize: number;
}

export interface VegetationEstimate {
  coverage: number;
  mask: Uint8Array;
  vegetationPixels: number;
  totalPixels: number;
  width: number;
  height: number;
}

export const DEFAULT_VEGETATION_CONFIG: VegetationConfig = {
  hueMin: 60,
  hueMax: 180,
  minSaturation: 0.15,
  minValue: 0.15,
  openingKernelSize: 3,
};

export interface Hsv {
  h: number;
  s: number;
  v: number;
}

export const rgbToHsv = (r: number, g: number, b: number): Hsv => {
  const rn = r / 255;
  const gn = g / 255;
  const bn = b / 255;
  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const delta = max - min;

  let h = 0;
  if (delta > 0) {
    if (max === rn) {
      h = 60 * (((gn - bn) / delta) % 6);
    } else if (max === gn) {
      h = 60 * ((bn - rn) / delta + 2);
    } else {
      h = 60 * ((rn - gn) / delta + 4);
    }
  }
  if (h < 0) h += 360;

  return { h, s: max === 0 ? 0 : delta / max, v: max };
};

const assertRaster = (raster: Raster) => {
  const { width, height, channels, data } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new InvalidImageError('Image dimensions must be integers', {
      width,
      height,
    });
  }
  if (width <= 0 || height <= 0) {
    throw new InvalidImageError('Image has zero area', { width, height });
  }
  if (data.length !== width * height * channels) {
    throw new InvalidImageError('Pixel buffer does not match dimensions', {
      width,
      height,
      channels,
      length: data.length,
    });
  }
};

const assertKernel = (config: Pick<VegetationConfig, 'openingKernelSize'>) => {
  const size = config.openingKernelSize;
  if (!Number.isInteger(size) || size < 1 || size % 2 === 0) {
    throw new RangeError(
      `openingKernelSize must be a positive odd integer (got ${size})`
    );
  }
};

export const classifyVegetation = (
  raster: Raster,
  config: VegetationConfig
): Uint8Array => {
  const { width, height, channels, data } = raster;
  const mask = new Uint8Array(width * height);
  for (let i = 0; i < mask.length; i += 1) {
    const offset = i * channels;
    const { h, s, v } = rgbToHsv(data[offset], data[offset + 1], data[offset + 2]);
    if (
      h >= config.hueMin &&
      h <= config.hueMax &&
      s >= config.minSaturation &&
      v >= config.minValue
    ) {
      mask[i] = 1;
    }
  }
  return mask;
};

// mode 'erode': すべての近傍が1なら1 / 'dilate': いずれかの近傍が1なら1
const morph = (
  mask: Uint8Array,
  width: number,
  height: number,
  radius: number,
  mode: 'erode' | 'dilate'
): Uint8Array => {
  const out = new Uint8Array(mask.length);
  const target = mode === 'erode' ? 0 : 1;
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let hit = false;
      for (let dy = -radius; dy <= radius && !hit; dy += 1) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (let dx = -radius; dx <= radius; dx += 1) {
          const nx = x + dx;
          if (nx < 0 || nx >= width) continue;
          if (mask[ny * width + nx] === target) {
            hit = true;
            break;
          }
        }
      }
      const index = y * width + x;
      out[index] = mode === 'erode' ? (hit ? 0 : 1) : hit ? 1 : 0;
    }
  }
  return out;
};

export const morphologicalOpening = (
  mask: Uint8Array,
  width: number,
  height: number,
  kernelSize: number
): Uint8Array => {
  const radius = Math.floor(kernelSize / 2);
  if (radius === 0) return Uint8Array.from(mask);
  const eroded = morph(mask, width, height, radius, 'erode');
  return morph(eroded, width, height, radius, 'dilate');
};

const summarize = (
  mask: Uint8Array,
  width: number,
  height: number
): VegetationEstimate => {
  let vegetationPixels = 0;
  for (const value of mask) vegetationPixels += value;
  const totalPixels = width * height;
  return {
    coverage: vegetationPixels / totalPixels,
    mask,
    vegetationPixels,
    totalPixels,
    width,
    height,
  };
};

export const estimateVegetationCoverage = (
  raster: Raster,
  config: VegetationConfig = DEFAULT_VEGETATION_CONFIG
): VegetationEstimate => {
  assertRaster(raster);
  assertKernel(config);
  const raw = classifyVegetation(raster, config);
  const opened = morphologicalOpening(
    raw,
    raster.width,
    raster.height,
    config.openingKernelSize
  );
  return summarize(opened, raster.width, raster.height);
};

/** Same opening and fraction over a mask computed elsewhere (0 = background, non-zero = vegetation). */
export const estimateCoverageFromMask = (
  mask: Uint8Array,
  width: number,
  height: number,
  config: Pick<VegetationConfig, 'openingKernelSize'> = DEFAULT_VEGETATION_CONFIG
): VegetationEstimate => {
  if (width <= 0 || height <= 0 || mask.length !== width * height) {
    throw new InvalidImageError('Mask does not match dimensions', {
      width,
      height,
      length: mask.length,
    });
  }
  assertKernel(config);
  const binary = mask.map((value) => (value > 0 ? 1 : 0));
  const opened = morphologicalOpening(
    binary,
    width,
    height,
    config.openingKernelSize
  );
  return summarize(opened, width, height);
};
