import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { ImageLoadError } from './errors';
import { cropJpeg, inspectPanorama, isPossiblyEquirectangular, loadPanorama } from './image-io';

function solidPng(width: number, height: number, channels: 3 | 4) {
  return sharp({ create: { width, height, channels, background: { r: 255, g: 0, b: 0, alpha: 1 } } })
    .png()
    .toBuffer();
}

describe('loadPanorama', () => {
  it('decodes to three interleaved channels without alpha', async () => {
    const image = await loadPanorama(await solidPng(4, 2, 4));
    expect(image.width).toBe(4);
    expect(image.height).toBe(2);
    expect(image.channels).toBe(3);
    expect(image.data.length).toBe(24);
    expect(Array.from(image.data.slice(0, 3))).toEqual([255, 0, 0]);
  });

  it('wraps decode failures in ImageLoadError', async () => {
    await expect(loadPanorama(Buffer.from('not an image'))).rejects.toBeInstanceOf(ImageLoadError);
  });
});

describe('inspectPanorama', () => {
  it('flags a 2:1 image as equirectangular', async () => {
    const info = await inspectPanorama(await solidPng(64, 32, 3));
    expect(info).toEqual({ width: 64, height: 32, format: 'png', aspectRatio: 2, possibleEquirectangular: true });
  });

  it('checks the aspect ratio within 0.1 of 2', () => {
    expect(isPossiblyEquirectangular(2100, 1000)).toBe(false);
    expect(isPossiblyEquirectangular(2090, 1000)).toBe(true);
    expect(isPossiblyEquirectangular(100, 0)).toBe(false);
  });
});

describe('cropJpeg', () => {
  it('returns null for a region with no whole pixels', async () => {
    const image = await loadPanorama(await solidPng(8, 8, 3));
    expect(await cropJpeg(image, { left: 2.2, top: 1, right: 2.9, bottom: 6 })).toBeNull();
  });

  it('encodes a JPEG of the clamped region', async () => {
    const image = await loadPanorama(await solidPng(8, 8, 3));
    const jpeg = await cropJpeg(image, { left: -3, top: 2, right: 20, bottom: 6 });
    expect(jpeg?.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    const meta = await sharp(jpeg ?? Buffer.alloc(0)).metadata();
    expect([meta.width, meta.height]).toEqual([8, 4]);
  });
});
