/**
 * Cube face basis and spherical/equirectangular conversions.
 */
import { assertFinite, InvalidFaceError } from './errors';
import { FACE_NAMES } from './types';
import type { EquirectPixel, Face, FaceName, SphericalAngles, Vec3 } from './types';

// ==========================================
// FACE BASIS
// ==========================================

const FACE_BASIS: Record<Face, (a: number, b: number) => Vec3> = {
  0: (a, b) => [a, b, 1], // front (+Z)
  1: (a, b) => [1, b, -a], // right (+X)
  2: (a, b) => [-a, b, -1], // back (-Z)
  3: (a, b) => [-1, b, a], // left (-X)
  4: (a, b) => [a, 1, -b], // up (+Y)
  5: (a, b) => [a, -1, b], // down (-Y)
};

export function isFace(value: unknown): value is Face {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 5;
}

function isFaceName(value: string): value is FaceName {
  return FACE_NAMES.some((name) => name === value);
}

/**
 * Resolve a face from its index (number or numeric string) or its name.
 */
export function toFace(value: number | string): Face {
  if (typeof value === 'string') {
    const key = value.trim().toLowerCase();
    if (isFaceName(key)) return faceFromName(key);
    if (/^\d+$/.test(key)) return toFace(Number(key));
    throw new InvalidFaceError(value);
  }
  if (!isFace(value)) throw new InvalidFaceError(value);
  return value;
}

export function faceFromName(name: FaceName): Face {
  return toFace(FACE_NAMES.indexOf(name));
}

export function faceName(face: Face): FaceName {
  return FACE_NAMES[face];
}

/**
 * Pixel (i, j) on a face of side cubeSize -> (a, b) in [-1, 1]².
 * Rows grow downward, so b decreases as j increases.
 */
export function normalizeFaceCoord(i: number, j: number, cubeSize: number): { a: number; b: number } {
  return {
    a: (2 * i) / cubeSize - 1,
    b: 1 - (2 * j) / cubeSize,
  };
}

export function direction(face: Face, a: number, b: number): Vec3 {
  if (!isFace(face)) throw new InvalidFaceError(face);
  assertFinite('a', a);
  assertFinite('b', b);
  return FACE_BASIS[face](a, b);
}

// ==========================================
// SPHERICAL CONVERTER
// ==========================================

export function toSpherical([x, y, z]: Vec3): SphericalAngles {
  return {
    theta: Math.atan2(y, Math.sqrt(x * x + z * z)),
    phi: Math.atan2(x, z),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Angles -> integer panorama pixel, clamped to the image so seam and pole
 * samples never index out of bounds.
 */
export function toEquirectPixel(angles: SphericalAngles, width: number, height: number): EquirectPixel {
  const x = (angles.phi / Math.PI + 1) * 0.5 * width;
  const y = (0.5 - angles.theta / Math.PI) * height;
  return {
    x: Math.trunc(clamp(x, 0, width - 1)),
    y: Math.trunc(clamp(y, 0, height - 1)),
  };
}

/** Inverse of the unclamped equirectangular mapping. */
export function fromEquirectPixel(x: number, y: number, width: number, height: number): SphericalAngles {
  return {
    phi: ((2 * x) / width - 1) * Math.PI,
    theta: (0.5 - y / height) * Math.PI,
  };
}

/** Longitude in radians -> compass degrees in [0, 360). */
export function azimuthDegrees(phi: number): number {
  assertFinite('phi', phi);
  let deg = (phi * 180) / Math.PI;
  if (deg < 0) deg += 360;
  // a tiny negative angle rounds up to exactly 360
  if (deg >= 360) deg -= 360;
  return deg || 0; // -0
}

/**
 * Face pixel -> panorama pixel for a W×H equirectangular source.
 */
export function cubeToEquirect(
  face: Face,
  i: number,
  j: number,
  cubeSize: number,
  width: number,
  height: number
): EquirectPixel {
  const { a, b } = normalizeFaceCoord(i, j, cubeSize);
  return toEquirectPixel(toSpherical(direction(face, a, b)), width, height);
}

/** Face pixel -> compass bearing in degrees. */
export function cubeToAzimuth(face: Face, i: number, j: number, cubeSize: number): number {
  const { a, b } = normalizeFaceCoord(i, j, cubeSize);
  return azimuthDegrees(toSpherical(direction(face, a, b)).phi);
}
