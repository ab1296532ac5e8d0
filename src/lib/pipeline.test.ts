import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FaceDetector } from './detector';
import { DistanceEstimator } from './distance';
import { defaultPipelineConfig, listPanoramas, OUTPUT_FILES, outputDirFor, PanoramaPipeline } from './pipeline';
import { parseAzimuthsFile, parseDetectionsFile, parseGeocodedFile, readJsonFile } from './records';

const detector: FaceDetector = {
  async detect(face) {
    if (face !== 0) return [];
    return [{ bbox_index: 5, box: [4, 4, 12, 12], class_id: 0, score: 0.9 }];
  },
};

const distanceEstimator: DistanceEstimator = {
  async estimateDistance() {
    return 25;
  },
};

describe('PanoramaPipeline', () => {
  let dir: string;
  let imagePath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
    imagePath = path.join(dir, 'street.png');
    await sharp({ create: { width: 64, height: 32, channels: 3, background: { r: 90, g: 120, b: 150 } } })
      .png()
      .toFile(imagePath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function pipeline(origin: { latitude: number; longitude: number } | null) {
    return new PanoramaPipeline(defaultPipelineConfig({ outputRoot: dir, annotateFaces: false }), {
      detector,
      distanceEstimator,
      readOrigin: async () => origin,
    });
  }

  it('writes faces, records and coordinates for a geotagged panorama', async () => {
    const report = await pipeline({ latitude: 10, longitude: 20 }).processImage(imagePath);
    const outputDir = path.join(dir, 'output_street');

    expect(report.outputDir).toBe(outputDir);
    expect(report.status).toBe('complete');
    expect(report.cubeSize).toBe(16);
    expect(report.detections).toBe(1);
    expect(report.geocoded).toBe(1);

    for (const name of ['front', 'right', 'back', 'left', 'up', 'down']) {
      const meta = await sharp(path.join(outputDir, `${name}.jpg`)).metadata();
      expect([meta.width, meta.height]).toEqual([16, 16]);
    }
    const cross = await sharp(path.join(outputDir, OUTPUT_FILES.cross)).metadata();
    expect([cross.width, cross.height]).toEqual([64, 48]);
    expect(fs.existsSync(path.join(outputDir, OUTPUT_FILES.contours))).toBe(true);

    const detections = parseDetectionsFile(await readJsonFile(path.join(outputDir, OUTPUT_FILES.detections)));
    expect(detections.front).toEqual([{ bbox_index: 0, box: [4, 4, 12, 12], class_id: 0, score: 0.9 }]);
    expect(detections.back).toEqual([]);

    const azimuths = parseAzimuthsFile(await readJsonFile(path.join(outputDir, OUTPUT_FILES.azimuths)));
    expect(azimuths.front).toEqual([{ bbox_index: 0, class_id: 0, azimuth_deg: 0 }]);

    const coords = parseGeocodedFile(await readJsonFile(path.join(outputDir, OUTPUT_FILES.coords)));
    const [hit] = coords.front ?? [];
    expect(hit.distance_m).toBe(25);
    expect(hit.score).toBe(0.9);
    expect(hit.latitude).toBeCloseTo(10.00022483, 8);
    expect(hit.longitude).toBeCloseTo(20, 10);
  });

  it('marks a panorama without an origin as incomplete', async () => {
    const report = await pipeline(null).processImage(imagePath);

    expect(report.status).toBe('incomplete');
    expect(report.geocoded).toBe(0);
    expect(fs.existsSync(path.join(report.outputDir, OUTPUT_FILES.distances))).toBe(true);
    expect(fs.existsSync(path.join(report.outputDir, OUTPUT_FILES.coords))).toBe(false);
  });

  it('skips images that fail and keeps going', async () => {
    const badPath = path.join(dir, 'broken.jpg');
    fs.writeFileSync(badPath, 'not a jpeg');

    const images = listPanoramas(dir);
    expect(images).toEqual([badPath, imagePath]);

    const summary = await pipeline({ latitude: 0, longitude: 0 }).run(images);

    expect(summary.processed.map((r) => r.image)).toEqual([imagePath]);
    expect(summary.incomplete).toEqual([]);
    expect(summary.skipped).toHaveLength(1);
    expect(summary.skipped[0].image).toBe(badPath);
    expect(summary.skipped[0].reason.startsWith('ImageLoadError: Unable to load image:')).toBe(true);
    expect(fs.existsSync(outputDirFor(badPath, dir))).toBe(false);
  });
});
