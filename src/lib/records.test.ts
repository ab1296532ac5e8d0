import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { InvalidFaceError } from './errors';
import {
  parseAzimuthsFile,
  parseDetectionsFile,
  parseDistancesFile,
  readJsonFile,
  serializeDetections,
  writeJsonFile,
} from './records';

describe('parseDetectionsFile', () => {
  it('aligns boxes, scores and classes by position', () => {
    const parsed = parseDetectionsFile({
      '0': { boxes: [[200, 100, 100, 50]], scores: [0.9], classes: [2.0] },
      left: { boxes: [[1, 2, 3, 4], [5, 6, 7, 8]], classes: [1] },
    });

    expect(Object.keys(parsed)).toEqual(['front', 'left']);
    expect(parsed.front).toEqual([{ bbox_index: 0, box: [100, 50, 200, 100], class_id: 2, score: 0.9 }]);
    expect(parsed.left).toEqual([
      { bbox_index: 0, box: [1, 2, 3, 4], class_id: 1, score: null },
      { bbox_index: 1, box: [5, 6, 7, 8], class_id: null, score: null },
    ]);
  });

  it('treats a face with no fields as empty', () => {
    expect(parseDetectionsFile({ '5': {} })).toEqual({ down: [] });
  });

  it('rejects keys that are not faces', () => {
    expect(() => parseDetectionsFile({ '7': { boxes: [] } })).toThrow(InvalidFaceError);
  });
});

describe('serializeDetections', () => {
  it('writes face-index keys with positional arrays', () => {
    expect(
      serializeDetections({
        left: [
          { bbox_index: 1, box: [5, 6, 7, 8], class_id: null, score: 0.4 },
          { bbox_index: 0, box: [1, 2, 3, 4], class_id: 3, score: 0.8 },
        ],
      })
    ).toEqual({
      '3': { boxes: [[1, 2, 3, 4], [5, 6, 7, 8]], scores: [0.8, 0.4], classes: [3, null] },
    });
  });
});

describe('azimuth and distance files', () => {
  it('rejects an azimuth of 360', () => {
    expect(() => parseAzimuthsFile({ front: [{ bbox_index: 0, class_id: 1, azimuth_deg: 360 }] })).toThrow();
  });

  it('fills missing distance fields with null', () => {
    expect(parseDistancesFile({ back: [{ bbox_index: 4 }] })).toEqual({
      back: [{ bbox_index: 4, class_id: null, score: null, distance_m: null }],
    });
  });
});

describe('JSON file helpers', () => {
  const dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes indented JSON and reads it back', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'records-'));
    dirs.push(dir);
    const file = path.join(dir, 'nested', 'azimuths.json');
    await writeJsonFile(file, { front: [] });
    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "front": []\n}\n');
    expect(await readJsonFile(file)).toEqual({ front: [] });
  });
});
