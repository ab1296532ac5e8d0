/**
 * Face detectors: the model-backed one and one replaying a detections file.
 */
import { z } from 'zod';
import { faceName } from './geometry';
import { encodeJpeg } from './image-io';
import { AIPool } from './pool';
import { normalizeBox } from './records';
import type { Box2D, DetectionsByFace, Face, FaceDetection, RawImage } from './types';

export interface FaceDetector {
  detect(face: Face, image: RawImage): Promise<FaceDetection[]>;
}

// ==========================================
// MODEL-BACKED DETECTOR
// ==========================================

const DetectionSchema = z.object({
  objects: z.array(
    z.object({
      label: z.string(),
      box_2d: z.array(z.number()).min(4).max(4).describe('[xmin, ymin, xmax, ymax] normalized to 0-1000'),
      confidence: z.number().min(0).max(1).optional(),
    })
  ),
});

export type DetectionResponse = z.infer<typeof DetectionSchema>;

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

/**
 * 0-1000 normalized box -> face pixel box, ordered so x1 <= x2 and y1 <= y2.
 */
export function normalizedToFacePixels(box: number[], width: number, height: number): Box2D {
  const [x1, y1, x2, y2] = normalizeBox(box.map((v) => clamp(v, 0, 1000)));
  return [(x1 / 1000) * width, (y1 / 1000) * height, (x2 / 1000) * width, (y2 / 1000) * height];
}

/**
 * Class ids are positions in `labels`; objects with any other label are dropped.
 */
export function toFaceDetections(response: DetectionResponse, labels: string[], image: RawImage): FaceDetection[] {
  const lookup = new Map(labels.map((label, index) => [label.trim().toLowerCase(), index]));
  const detections: FaceDetection[] = [];
  for (const obj of response.objects) {
    const classId = lookup.get(obj.label.trim().toLowerCase());
    if (classId === undefined) continue;
    detections.push({
      bbox_index: detections.length,
      box: normalizedToFacePixels(obj.box_2d, image.width, image.height),
      class_id: classId,
      score: obj.confidence ?? null,
    });
  }
  return detections;
}

export class GeminiFaceDetector implements FaceDetector {
  constructor(
    private pool: AIPool,
    private labels: string[]
  ) {}

  async detect(face: Face, image: RawImage): Promise<FaceDetection[]> {
    const prompt = `
This is the "${faceName(face)}" face of a cubemap cut from a 360° street-level panorama (90° field of view).
Task: Detect ALL visible instances of these kinds: ${this.labels.join(', ')}.
Use exactly one of those kind names as each object's label.
Return bounding boxes [xmin, ymin, xmax, ymax] normalized to 0-1000 and a confidence between 0 and 1.
Return an empty list if none are visible.
`;
    const jpeg = await encodeJpeg(image);
    const response = await this.pool.generateObject({
      schema: DetectionSchema,
      messages: [{ role: 'user', content: [{ type: 'text', text: prompt }, { type: 'image', image: jpeg }] }],
    });
    return toFaceDetections(response, this.labels, image);
  }
}

// ==========================================
// FILE-BACKED DETECTOR
// ==========================================

export class FileDetections implements FaceDetector {
  constructor(private detections: DetectionsByFace) {}

  async detect(face: Face): Promise<FaceDetection[]> {
    return this.detections[faceName(face)] ?? [];
  }
}
