/**
 * Equirectangular panorama -> cube faces, nearest-pixel pull resampling.
 */
import { cubeToEquirect } from './geometry';
import { FACES } from './types';
import type { Face, RawImage } from './types';

/**
 * Source pixel index (y * W + x) for every destination pixel (j * cubeSize + i)
 * of one face. Depends only on the face, cubeSize and the source dimensions.
 */
export function buildFaceLookup(face: Face, cubeSize: number, width: number, height: number): Uint32Array {
  const table = new Uint32Array(cubeSize * cubeSize);
  for (let j = 0; j < cubeSize; j++) {
    for (let i = 0; i < cubeSize; i++) {
      const { x, y } = cubeToEquirect(face, i, j, cubeSize, width, height);
      table[j * cubeSize + i] = y * width + x;
    }
  }
  return table;
}

export class FaceLookupCache {
  private tables = new Map<string, Uint32Array>();

  get(face: Face, cubeSize: number, width: number, height: number): Uint32Array {
    const key = `${face}:${cubeSize}:${width}x${height}`;
    let table = this.tables.get(key);
    if (!table) {
      table = buildFaceLookup(face, cubeSize, width, height);
      this.tables.set(key, table);
    }
    return table;
  }

  get size(): number {
    return this.tables.size;
  }
}

export function rasterizeFace(
  source: RawImage,
  face: Face,
  cubeSize: number,
  lookup: Uint32Array = buildFaceLookup(face, cubeSize, source.width, source.height)
): RawImage {
  if (!Number.isInteger(cubeSize) || cubeSize < 1) {
    throw new RangeError(`cubeSize must be a positive integer, got ${cubeSize}`);
  }
  if (lookup.length !== cubeSize * cubeSize) {
    throw new RangeError(`Lookup table has ${lookup.length} entries, expected ${cubeSize * cubeSize}`);
  }

  const { channels } = source;
  const data = new Uint8Array(cubeSize * cubeSize * channels);
  for (let p = 0; p < lookup.length; p++) {
    const src = lookup[p] * channels;
    const dst = p * channels;
    for (let c = 0; c < channels; c++) {
      data[dst + c] = source.data[src + c];
    }
  }
  return { data, width: cubeSize, height: cubeSize, channels };
}

/**
 * All six faces in index order. The source buffer is only read.
 */
export function extractCubeFaces(
  source: RawImage,
  cubeSize: number,
  cache: FaceLookupCache = new FaceLookupCache()
): RawImage[] {
  return FACES.map((face) =>
    rasterizeFace(source, face, cubeSize, cache.get(face, cubeSize, source.width, source.height))
  );
}

export function defaultCubeSize(panoramaWidth: number): number {
  return Math.max(1, Math.floor(panoramaWidth / 4));
}

// Cell (column, row) of each face in the 4×3 cross
const CROSS_CELLS: Record<Face, [number, number]> = {
  0: [1, 1], // front
  1: [2, 1], // right
  2: [3, 1], // back
  3: [0, 1], // left
  4: [1, 0], // up
  5: [1, 2], // down
};

/**
 * Lay out six faces as a horizontal cross:
 *
 *        [up]
 *  [left][front][right][back]
 *        [down]
 */
export function composeCrossLayout(faces: RawImage[]): RawImage {
  if (faces.length !== 6) {
    throw new RangeError(`Cross layout needs 6 faces, got ${faces.length}`);
  }
  const size = faces[0].width;
  const channels = faces[0].channels;
  for (const face of faces) {
    if (face.width !== size || face.height !== size || face.channels !== channels) {
      throw new RangeError('All faces must be square and share size and channel count');
    }
  }

  const width = size * 4;
  const height = size * 3;
  const data = new Uint8Array(width * height * channels);
  const rowBytes = size * channels;

  for (const face of FACES) {
    const [col, row] = CROSS_CELLS[face];
    const pixels = faces[face].data;
    for (let y = 0; y < size; y++) {
      const dst = ((row * size + y) * width + col * size) * channels;
      data.set(pixels.subarray(y * rowBytes, (y + 1) * rowBytes), dst);
    }
  }
  return { data, width, height, channels };
}
