import { describe, expect, it } from 'vitest';
import { azimuthOf, azimuthsFromDetectionsFile, boxCentroid, computeAzimuths } from './azimuth';

describe('azimuthOf', () => {
  it('uses the box centroid on the front face', () => {
    expect(boxCentroid([100, 100, 200, 200])).toEqual({ cx: 150, cy: 150 });
    expect(azimuthOf(0, [100, 100, 200, 200], 512)).toBeCloseTo(337.5, 1);
  });

  it('points each horizontal face centre at its compass quadrant', () => {
    const centre: [number, number, number, number] = [200, 200, 312, 312];
    expect(azimuthOf(0, centre, 512)).toBe(0);
    expect(azimuthOf(1, centre, 512)).toBeCloseTo(90, 10);
    expect(azimuthOf(2, centre, 512)).toBeCloseTo(180, 10);
    expect(azimuthOf(3, centre, 512)).toBeCloseTo(270, 10);
  });
});

describe('computeAzimuths', () => {
  it('keeps bbox_index and class_id and only lists faces with detections', () => {
    const result = computeAzimuths(
      {
        front: [{ bbox_index: 0, box: [100, 100, 200, 200], class_id: 3, score: 0.8 }],
        right: [
          { bbox_index: 0, box: [200, 200, 312, 312], class_id: null, score: null },
          { bbox_index: 1, box: [0, 0, 10, 10], class_id: 1, score: 0.5 },
        ],
      },
      512
    );

    expect(Object.keys(result)).toEqual(['front', 'right']);
    expect(result.front?.[0].bbox_index).toBe(0);
    expect(result.front?.[0].class_id).toBe(3);
    expect(result.front?.[0].azimuth_deg).toBeCloseTo(337.5, 1);
    expect(result.right?.[0].class_id).toBeNull();
    expect(result.right?.[0].azimuth_deg).toBeCloseTo(90, 10);
    expect(result.right?.[1].bbox_index).toBe(1);
  });
});

describe('azimuthsFromDetectionsFile', () => {
  it('reads face-index keys and re-keys the result by face name', () => {
    const result = azimuthsFromDetectionsFile(
      { '2': { boxes: [[312, 312, 200, 200]], scores: [0.4], classes: [5] }, '0': { boxes: [] } },
      512
    );

    expect(Object.keys(result)).toEqual(['front', 'back']);
    expect(result.front).toEqual([]);
    expect(result.back?.[0].bbox_index).toBe(0);
    expect(result.back?.[0].class_id).toBe(5);
    expect(result.back?.[0].azimuth_deg).toBeCloseTo(180, 10);
  });
});
