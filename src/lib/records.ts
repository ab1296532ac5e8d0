/**
 * JSON file shapes exchanged between pipeline stages.
 *
 * detections.json is keyed by face index ("0".."5"), the others by face name.
 */
import { z } from 'zod';
import fs from 'fs/promises';
import path from 'path';
import { faceName, toFace } from './geometry';
import { FACES } from './types';
import type { AzimuthsByFace, Box2D, DetectionsByFace, DistancesByFace, FaceDetection, GeocodedByFace, PerFace } from './types';

// ==========================================
// SCHEMAS
// ==========================================

const BoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const FaceDetectionsSchema = z.object({
  boxes: z.array(BoxSchema).default([]),
  scores: z.array(z.number().nullable()).default([]),
  classes: z.array(z.number().nullable()).default([]),
});

export const DetectionsFileSchema = z.record(z.string(), FaceDetectionsSchema);

export const AzimuthRecordSchema = z.object({
  bbox_index: z.number().int().min(0),
  class_id: z.number().int().nullable().default(null),
  azimuth_deg: z.number().min(0).lt(360),
});

export const DistanceRecordSchema = z.object({
  bbox_index: z.number().int().min(0),
  class_id: z.number().int().nullable().default(null),
  score: z.number().nullable().default(null),
  distance_m: z.number().nonnegative().nullable().default(null),
});

export const GeocodedRecordSchema = z.object({
  bbox_index: z.number().int().min(0),
  class_id: z.number().int().nullable(),
  score: z.number().nullable(),
  azimuth_deg: z.number(),
  distance_m: z.number(),
  latitude: z.number(),
  longitude: z.number(),
});

export const AzimuthsFileSchema = z.record(z.string(), z.array(AzimuthRecordSchema));
export const DistancesFileSchema = z.record(z.string(), z.array(DistanceRecordSchema));
export const GeocodedFileSchema = z.record(z.string(), z.array(GeocodedRecordSchema));

export type DetectionsFile = z.infer<typeof DetectionsFileSchema>;

// ==========================================
// NORMALIZATION
// ==========================================

export function normalizeBox(box: number[]): Box2D {
  const [x1 = 0, y1 = 0, x2 = 0, y2 = 0] = box;
  return [Math.min(x1, x2), Math.min(y1, y2), Math.max(x1, x2), Math.max(y1, y2)];
}

/**
 * Re-key a face-keyed record by face name, in face order. Keys may be face
 * indices or names; anything else is an InvalidFaceError.
 */
function byFaceName<T>(record: Record<string, T>): PerFace<T> {
  const keyed = new Map<number, T>();
  for (const [key, value] of Object.entries(record)) {
    keyed.set(toFace(key), value);
  }
  const result: PerFace<T> = {};
  for (const face of FACES) {
    const value = keyed.get(face);
    if (value !== undefined) result[faceName(face)] = value;
  }
  return result;
}

/**
 * Detections file -> per-face detections. bbox_index is the position in
 * `boxes`; a missing score or class becomes null.
 */
export function parseDetectionsFile(json: unknown): DetectionsByFace {
  const parsed = byFaceName(DetectionsFileSchema.parse(json));
  const result: DetectionsByFace = {};
  for (const face of FACES) {
    const name = faceName(face);
    const data = parsed[name];
    if (!data) continue;
    result[name] = data.boxes.map((box, index): FaceDetection => {
      const cls = data.classes[index];
      return {
        bbox_index: index,
        box: normalizeBox(box),
        class_id: cls === undefined || cls === null ? null : Math.trunc(cls),
        score: data.scores[index] ?? null,
      };
    });
  }
  return result;
}

export function serializeDetections(detections: DetectionsByFace): DetectionsFile {
  const file: DetectionsFile = {};
  for (const face of FACES) {
    const list = detections[faceName(face)];
    if (!list) continue;
    const ordered = [...list].sort((a, b) => a.bbox_index - b.bbox_index);
    file[String(face)] = {
      boxes: ordered.map((d) => d.box),
      scores: ordered.map((d) => d.score),
      classes: ordered.map((d) => d.class_id),
    };
  }
  return file;
}

export function parseAzimuthsFile(json: unknown): AzimuthsByFace {
  return byFaceName(AzimuthsFileSchema.parse(json));
}

export function parseDistancesFile(json: unknown): DistancesByFace {
  return byFaceName(DistancesFileSchema.parse(json));
}

export function parseGeocodedFile(json: unknown): GeocodedByFace {
  return byFaceName(GeocodedFileSchema.parse(json));
}

// ==========================================
// FILE HELPERS
// ==========================================

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}
