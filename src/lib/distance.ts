/**
 * Distance estimators and the per-face distance table.
 */
import { z } from 'zod';
import { runWithConcurrency } from './concurrency';
import { logErrorDetails } from './errors';
import { faceName } from './geometry';
import { cropJpeg, encodeJpeg } from './image-io';
import { AIPool } from './pool';
import { FACES } from './types';
import type { DetectionsByFace, DistanceRecord, DistancesByFace, Face, FaceDetection, RawImage } from './types';

export interface DistanceEstimator {
  /** Meters from the camera to the detection, or null when it cannot be estimated. */
  estimateDistance(face: Face, image: RawImage, detection: FaceDetection): Promise<number | null>;
}

const DistanceSchema = z.object({
  distance_m: z.number().nullable().describe('Estimated distance from the camera in meters, or null if unknown'),
  reason: z.string().describe('Brief reason for the estimate'),
});

export class GeminiDistanceEstimator implements DistanceEstimator {
  constructor(
    private pool: AIPool,
    private labels: string[] = []
  ) {}

  async estimateDistance(face: Face, image: RawImage, detection: FaceDetection): Promise<number | null> {
    const [x1, y1, x2, y2] = detection.box;
    const crop = await cropJpeg(image, { left: x1, top: y1, right: x2, bottom: y2 });
    if (!crop) return null;

    const kind = detection.class_id === null ? 'object' : this.labels[detection.class_id] ?? 'object';
    const prompt = `
The first image is the "${faceName(face)}" face of a cubemap from a 360° panorama taken at about 2.5 m height.
Each face is a 90° pinhole view, ${image.width}x${image.height} px.
The second image is the crop of one ${kind} at pixels [${x1.toFixed(0)}, ${y1.toFixed(0)}, ${x2.toFixed(0)}, ${y2.toFixed(0)}].
Task: Estimate the straight-line distance in meters from the camera to that ${kind}.
`;
    const full = await encodeJpeg(image);
    const response = await this.pool.generateObject({
      schema: DistanceSchema,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image', image: full },
            { type: 'image', image: crop },
          ],
        },
      ],
    });
    const d = response.distance_m;
    return d !== null && Number.isFinite(d) && d >= 0 ? d : null;
  }
}

export class FileDistances implements DistanceEstimator {
  constructor(private distances: DistancesByFace) {}

  async estimateDistance(face: Face, _image: RawImage, detection: FaceDetection): Promise<number | null> {
    const match = this.distances[faceName(face)]?.find((d) => d.bbox_index === detection.bbox_index);
    return match?.distance_m ?? null;
  }
}

/**
 * Distance record for every detection. A failed estimate is logged and kept
 * as a null distance so the detection is left out of geocoding.
 */
export async function estimateDistances(
  faces: RawImage[],
  detections: DetectionsByFace,
  estimator: DistanceEstimator,
  concurrency: number
): Promise<DistancesByFace> {
  const jobs: { face: Face; detection: FaceDetection }[] = [];
  for (const face of FACES) {
    for (const detection of detections[faceName(face)] ?? []) jobs.push({ face, detection });
  }

  const values = await runWithConcurrency(jobs, concurrency, async ({ face, detection }) => {
    try {
      return await estimator.estimateDistance(face, faces[face], detection);
    } catch (error) {
      logErrorDetails(`   ⚠️ Distance failed for ${faceName(face)}#${detection.bbox_index}: `, error);
      return null;
    }
  });

  const result: DistancesByFace = {};
  for (const face of FACES) {
    const name = faceName(face);
    if (detections[name]) result[name] = [];
  }
  jobs.forEach(({ face, detection }, i) => {
    const record: DistanceRecord = {
      bbox_index: detection.bbox_index,
      class_id: detection.class_id,
      score: detection.score,
      distance_m: values[i],
    };
    result[faceName(face)]?.push(record);
  });
  return result;
}
