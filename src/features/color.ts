import sharp from 'sharp';

export type Rgb = [number, number, number];

export function toHexcode([red, green, blue]: Rgb): string {
  return `#${[red, green, blue].map((value) => value.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * Root mean square of each channel over interleaved raw pixels
 */
export function rmsRgb(pixels: Uint8Array, channels: number): Rgb {
  if (channels < 3) throw new RangeError(`expected at least 3 channels, got ${channels}`);
  const count = Math.floor(pixels.length / channels);
  if (count === 0) return [0, 0, 0];
  const sums = [0, 0, 0];
  for (let i = 0; i < count * channels; i += channels) {
    for (let c = 0; c < 3; c++) {
      const value = pixels[i + c] ?? 0;
      sums[c] = (sums[c] ?? 0) + value * value;
    }
  }
  const rms = (sum: number | undefined): number => Math.round(Math.sqrt((sum ?? 0) / count));
  return [rms(sums[0]), rms(sums[1]), rms(sums[2])];
}

export class UnsupportedImageError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`unsupported image format: ${format}`);
    this.name = 'UnsupportedImageError';
    this.format = format;
  }
}

/**
 * GIF は対象外（UnsupportedImageError）
 */
export async function analyzeImage(image: Buffer): Promise<Rgb> {
  const metadata = await sharp(image).metadata();
  if (metadata.format === 'gif') {
    throw new UnsupportedImageError('gif');
  }
  const { data, info } = await sharp(image).removeAlpha().toColourspace('srgb').raw().toBuffer({ resolveWithObject: true });
  return rmsRgb(data, info.channels);
}
