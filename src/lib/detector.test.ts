import { describe, expect, it } from 'vitest';
import { FaceDetector, FileDetections, GeminiFaceDetector, normalizedToFacePixels, toFaceDetections } from './detector';
import { AIPool, ObjectExecutor } from './pool';
import type { FaceDetection, RawImage } from './types';

function blankFace(size: number): RawImage {
  return { data: new Uint8Array(size * size * 3).fill(128), width: size, height: size, channels: 3 };
}

describe('normalizedToFacePixels', () => {
  it('scales 0-1000 coordinates to the face and orders the corners', () => {
    expect(normalizedToFacePixels([500, 750, 100, 250], 512, 512)).toEqual([51.2, 128, 256, 384]);
  });
});

describe('toFaceDetections', () => {
  it('maps labels to class ids and drops unknown kinds', () => {
    const detections = toFaceDetections(
      {
        objects: [
          { label: 'Pole ', box_2d: [100, 250, 500, 750], confidence: 0.8 },
          { label: 'car', box_2d: [0, 0, 10, 10], confidence: 0.9 },
          { label: 'tree', box_2d: [-5, -10, 1200, 1000] },
        ],
      },
      ['tree', 'pole'],
      blankFace(512)
    );

    expect(detections).toEqual([
      { bbox_index: 0, box: [51.2, 128, 256, 384], class_id: 1, score: 0.8 },
      { bbox_index: 1, box: [0, 0, 512, 512], class_id: 0, score: null },
    ]);
  });
});

describe('GeminiFaceDetector', () => {
  it('sends the face image and converts the structured response', async () => {
    const requests: { model: string; parts: number }[] = [];
    const executor: ObjectExecutor = async (request) => {
      const [message] = request.messages;
      requests.push({ model: request.model, parts: Array.isArray(message.content) ? message.content.length : 0 });
      return {
        object: request.schema.parse({ objects: [{ label: 'tree', box_2d: [0, 0, 500, 500], confidence: 0.5 }] }),
      };
    };
    const detector = new GeminiFaceDetector(new AIPool({ maxConcurrency: 1, model: 'test-model' }, executor), ['tree']);

    const detections = await detector.detect(2, blankFace(4));

    expect(requests).toEqual([{ model: 'test-model', parts: 2 }]);
    expect(detections).toEqual([{ bbox_index: 0, box: [0, 0, 2, 2], class_id: 0, score: 0.5 }]);
  });
});

describe('FileDetections', () => {
  it('replays stored detections per face', async () => {
    const stored: FaceDetection = { bbox_index: 0, box: [1, 2, 3, 4], class_id: 3, score: 0.7 };
    const detector: FaceDetector = new FileDetections({ left: [stored] });

    expect(await detector.detect(3, blankFace(4))).toEqual([stored]);
    expect(await detector.detect(0, blankFace(4))).toEqual([]);
  });
});
