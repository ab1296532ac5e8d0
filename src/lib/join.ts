/**
 * Joins per-face azimuths and distances into geocoded detections.
 */
import { destination } from './geodesic';
import { FACE_NAMES } from './types';
import type { AzimuthsByFace, DistanceRecord, DistancesByFace, GeocodedByFace, GeocodedDetection, GeoPosition } from './types';

function indexByBbox(records: DistanceRecord[] = []): Map<number, DistanceRecord> {
  const index = new Map<number, DistanceRecord>();
  for (const record of records) {
    // first record wins, as a front-to-back scan would find it
    if (!index.has(record.bbox_index)) index.set(record.bbox_index, record);
  }
  return index;
}

/**
 * Detections without a distance for the same (face, bbox_index), or whose
 * distance is null, are left out. Output keeps face order and, within a
 * face, the order of the azimuth list.
 */
export function joinDetections(
  origin: GeoPosition,
  azimuths: AzimuthsByFace,
  distances: DistancesByFace
): GeocodedByFace {
  const result: GeocodedByFace = {};

  for (const face of FACE_NAMES) {
    const faceAzimuths = azimuths[face];
    if (!faceAzimuths) continue;

    const byIndex = indexByBbox(distances[face]);
    const geocoded: GeocodedDetection[] = [];

    for (const item of faceAzimuths) {
      const match = byIndex.get(item.bbox_index);
      if (!match || match.distance_m === null) continue;

      const { latitude, longitude } = destination(
        origin.latitude,
        origin.longitude,
        item.azimuth_deg,
        match.distance_m
      );
      geocoded.push({
        bbox_index: item.bbox_index,
        class_id: item.class_id,
        score: match.score,
        azimuth_deg: item.azimuth_deg,
        distance_m: match.distance_m,
        latitude,
        longitude,
      });
    }
    result[face] = geocoded;
  }

  return result;
}

export function countRecords<T>(byFace: Partial<Record<string, T[]>>): number {
  let total = 0;
  for (const list of Object.values(byFace)) total += list?.length ?? 0;
  return total;
}
