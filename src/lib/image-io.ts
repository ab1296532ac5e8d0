/**
 * Decoding and encoding panoramas and faces with sharp.
 */
import sharp from 'sharp';
import path from 'path';
import { ImageLoadError } from './errors';
import type { RawImage } from './types';

export type ImageInput = string | Buffer;

function describeInput(input: ImageInput): string {
  return typeof input === 'string' ? input : `<buffer ${input.length} bytes>`;
}

/**
 * Decode to interleaved 8-bit pixels without alpha.
 */
export async function loadPanorama(input: ImageInput): Promise<RawImage> {
  try {
    const { data, info } = await sharp(input).removeAlpha().raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    throw new ImageLoadError(describeInput(input), { cause: error });
  }
}

export type PanoramaInfo = {
  width: number;
  height: number;
  format: string | null;
  aspectRatio: number;
  possibleEquirectangular: boolean;
};

export function isPossiblyEquirectangular(width: number, height: number): boolean {
  return height > 0 && Math.abs(width / height - 2) < 0.1;
}

export async function inspectPanorama(input: ImageInput): Promise<PanoramaInfo> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(input).metadata();
  } catch (error) {
    throw new ImageLoadError(describeInput(input), { cause: error });
  }
  if (!metadata.width || !metadata.height) {
    throw new ImageLoadError(describeInput(input), { cause: new Error('Unable to read image dimensions.') });
  }
  return {
    width: metadata.width,
    height: metadata.height,
    format: metadata.format ?? null,
    aspectRatio: metadata.width / metadata.height,
    possibleEquirectangular: isPossiblyEquirectangular(metadata.width, metadata.height),
  };
}

export function rawPipeline(image: RawImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export function applyOutputFormat(pipeline: sharp.Sharp, outputPath: string, quality = 95): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') return pipeline.jpeg({ quality });
  if (ext === '.webp') return pipeline.webp({ quality });
  return pipeline.png();
}

export async function saveRawImage(image: RawImage, outputPath: string, quality = 95): Promise<void> {
  await applyOutputFormat(rawPipeline(image), outputPath, quality).toFile(outputPath);
}

export async function encodeJpeg(image: RawImage, quality = 90): Promise<Buffer> {
  return rawPipeline(image).jpeg({ quality }).toBuffer();
}

/**
 * JPEG of a pixel region; null when the region is empty after truncating
 * the box to whole pixels.
 */
export async function cropJpeg(
  image: RawImage,
  region: { left: number; top: number; right: number; bottom: number }
): Promise<Buffer | null> {
  const left = Math.max(0, Math.trunc(region.left));
  const top = Math.max(0, Math.trunc(region.top));
  const right = Math.min(image.width, Math.trunc(region.right));
  const bottom = Math.min(image.height, Math.trunc(region.bottom));
  if (right <= left || bottom <= top) return null;

  return rawPipeline(image)
    .extract({ left, top, width: right - left, height: bottom - top })
    .jpeg({ quality: 90 })
    .toBuffer();
}
