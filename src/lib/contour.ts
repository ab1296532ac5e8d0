/**
 * Face-space bounding box -> sampled outline in panorama pixel space.
 *
 * Boxes whose projection crosses the ±180° seam or a pole come out with a
 * jump in x or y; callers drawing the polyline see that as a long segment.
 */
import { cubeToEquirect } from './geometry';
import type { Box2D, EquirectPixel, Face } from './types';

export const DEFAULT_EDGE_SAMPLES = 20;

export type ContourOptions = {
  cubeSize: number;
  width: number; // panorama width
  height: number; // panorama height
  samplesPerEdge?: number;
};

function edgeStep(length: number, samples: number): number {
  return Math.max(1, Math.trunc(length / samples));
}

/**
 * Walk the perimeter clockwise from the top-left corner: top edge left→right,
 * right edge top→bottom, bottom edge right→left, left edge bottom→top.
 * Steps come from the unrounded edge lengths, loop bounds from the truncated
 * corners. A zero-length edge contributes no points.
 */
export function mapBoxToEquirect(face: Face, box: Box2D, options: ContourOptions): EquirectPixel[] {
  const { cubeSize, width, height } = options;
  const samples = options.samplesPerEdge ?? DEFAULT_EDGE_SAMPLES;
  const [x1, y1, x2, y2] = box;

  const left = Math.trunc(x1);
  const right = Math.trunc(x2);
  const top = Math.trunc(y1);
  const bottom = Math.trunc(y2);
  const stepX = edgeStep(x2 - x1, samples);
  const stepY = edgeStep(y2 - y1, samples);

  const project = (i: number, j: number) => cubeToEquirect(face, i, j, cubeSize, width, height);
  const points: EquirectPixel[] = [];

  if (x2 > x1) {
    for (let x = left; x <= right; x += stepX) points.push(project(x, y1));
  }
  if (y2 > y1) {
    for (let y = top; y <= bottom; y += stepY) points.push(project(x2, y));
  }
  if (x2 > x1) {
    for (let x = right; x >= left; x -= stepX) points.push(project(x, y2));
  }
  if (y2 > y1) {
    for (let y = bottom; y >= top; y -= stepY) points.push(project(x1, y));
  }

  return points;
}

/** Polylines of two points or fewer cannot be drawn as an outline. */
export function isRenderableContour(points: EquirectPixel[]): boolean {
  return points.length > 2;
}
