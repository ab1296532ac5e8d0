import { cubeToAzimuth, faceName } from './geometry';
import { parseDetectionsFile } from './records';
import { FACES } from './types';
import type { AzimuthsByFace, Box2D, DetectionsByFace, Face } from './types';

export function boxCentroid([x1, y1, x2, y2]: Box2D): { cx: number; cy: number } {
  return { cx: (x1 + x2) / 2, cy: (y1 + y2) / 2 };
}

/**
 * Compass bearing of a detection, taken at the centroid of its box.
 */
export function azimuthOf(face: Face, box: Box2D, cubeSize: number): number {
  const { cx, cy } = boxCentroid(box);
  return cubeToAzimuth(face, cx, cy, cubeSize);
}

export function computeAzimuths(detections: DetectionsByFace, cubeSize: number): AzimuthsByFace {
  const result: AzimuthsByFace = {};
  for (const face of FACES) {
    const name = faceName(face);
    const list = detections[name];
    if (!list) continue;
    result[name] = list.map((det) => ({
      bbox_index: det.bbox_index,
      class_id: det.class_id,
      azimuth_deg: azimuthOf(face, det.box, cubeSize),
    }));
  }
  return result;
}

/** Azimuths for a raw detections file keyed by face index or name. */
export function azimuthsFromDetectionsFile(json: unknown, cubeSize: number): AzimuthsByFace {
  return computeAzimuths(parseDetectionsFile(json), cubeSize);
}
