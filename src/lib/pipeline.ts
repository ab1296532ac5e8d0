/**
 * Per-image and batch orchestration: panorama -> cube faces -> detections ->
 * azimuths -> distances -> geocoded detections.
 */
import fs from 'fs';
import path from 'path';
import { annotateFace, DEFAULT_CLASS_COLORS, drawContours, LabeledContour } from './annotator';
import { computeAzimuths } from './azimuth';
import { runWithConcurrency } from './concurrency';
import { DEFAULT_EDGE_SAMPLES, mapBoxToEquirect } from './contour';
import { FaceDetector } from './detector';
import { DistanceEstimator, estimateDistances } from './distance';
import { formatError, ImageLoadError, logErrorDetails, MissingOriginError } from './errors';
import { faceName } from './geometry';
import { readOrigin } from './gps';
import { loadPanorama, saveRawImage } from './image-io';
import { countRecords, joinDetections } from './join';
import { composeCrossLayout, defaultCubeSize, extractCubeFaces, FaceLookupCache } from './rasterizer';
import { serializeDetections, writeJsonFile } from './records';
import { FACES } from './types';
import type { DetectionsByFace, GeoPosition, GeocodedByFace, RawImage } from './types';

// ==========================================
// TYPES
// ==========================================

export type PipelineConfig = {
  outputRoot: string;
  cubeSize: number | null; // null -> panorama width / 4
  faceQuality: number;
  concurrency: number;
  crossLayout: boolean;
  annotateFaces: boolean;
  contours: boolean;
  contourSamples: number;
  classColors: string[];
};

export type PipelineDeps = {
  detector: FaceDetector;
  distanceEstimator: DistanceEstimator;
  /** Defaults to reading EXIF GPS from the panorama */
  readOrigin?: (imagePath: string) => Promise<GeoPosition | null>;
};

export type ImageReport = {
  image: string;
  outputDir: string;
  status: 'complete' | 'incomplete';
  cubeSize: number;
  detections: number;
  geocoded: number;
  origin: GeoPosition | null;
  files: string[];
};

export type RunSummary = {
  processed: ImageReport[];
  incomplete: string[];
  skipped: { image: string; reason: string }[];
};

export const OUTPUT_FILES = {
  cross: 'cubemap_cross.jpg',
  detections: 'detections.json',
  azimuths: 'azimuths.json',
  distances: 'distances.json',
  coords: 'coords.json',
  contours: 'contours.jpg',
} as const;

export function defaultPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    outputRoot: '.',
    cubeSize: null,
    faceQuality: 95,
    concurrency: 6,
    crossLayout: true,
    annotateFaces: true,
    contours: true,
    contourSamples: DEFAULT_EDGE_SAMPLES,
    classColors: DEFAULT_CLASS_COLORS,
    ...overrides,
  };
}

export function outputDirFor(imagePath: string, outputRoot: string): string {
  const name = path.basename(imagePath, path.extname(imagePath));
  return path.join(outputRoot, `output_${name}`);
}

const IMAGE_EXTENSIONS = /\.(jpe?g|png)$/i;

export function listPanoramas(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => IMAGE_EXTENSIONS.test(f))
    .map((f) => path.join(dir, f))
    .filter((p) => fs.statSync(p).isFile())
    .sort();
}

// ==========================================
// CLASS
// ==========================================

export class PanoramaPipeline {
  private config: PipelineConfig;
  private deps: Required<PipelineDeps>;
  private lookups = new FaceLookupCache();

  constructor(config: PipelineConfig, deps: PipelineDeps) {
    this.config = config;
    this.deps = {
      detector: deps.detector,
      distanceEstimator: deps.distanceEstimator,
      readOrigin: deps.readOrigin ?? readOrigin,
    };
  }

  async processImage(imagePath: string): Promise<ImageReport> {
    const outputDir = outputDirFor(imagePath, this.config.outputRoot);
    const files: string[] = [];
    const write = async (name: string, value: unknown) => {
      const filePath = path.join(outputDir, name);
      await writeJsonFile(filePath, value);
      files.push(filePath);
    };

    console.log(`🌐 Processing ${imagePath} → ${outputDir}`);
    const panorama = await loadPanorama(imagePath);
    fs.mkdirSync(outputDir, { recursive: true });

    const cubeSize = this.config.cubeSize ?? defaultCubeSize(panorama.width);
    console.log(`   Panorama ${panorama.width}x${panorama.height}, face size ${cubeSize}px`);

    // 1. Cube faces
    const faces = extractCubeFaces(panorama, cubeSize, this.lookups);
    for (const face of FACES) {
      const facePath = path.join(outputDir, `${faceName(face)}.jpg`);
      await saveRawImage(faces[face], facePath, this.config.faceQuality);
      files.push(facePath);
    }
    if (this.config.crossLayout) {
      const crossPath = path.join(outputDir, OUTPUT_FILES.cross);
      await saveRawImage(composeCrossLayout(faces), crossPath, this.config.faceQuality);
      files.push(crossPath);
    }
    console.log(`   ✅ Cubemap written (6 faces)`);

    // 2. Detections
    const detections = await this.detectFaces(faces);
    await write(OUTPUT_FILES.detections, serializeDetections(detections));
    const detectionCount = countRecords(detections);
    console.log(`   📍 ${detectionCount} detection(s)`);

    if (this.config.annotateFaces) {
      for (const face of FACES) {
        const list = detections[faceName(face)] ?? [];
        if (list.length === 0) continue;
        const annotatedPath = path.join(outputDir, `${faceName(face)}_with_detections.jpg`);
        await annotateFace({
          face: faces[face],
          detections: list,
          outputPath: annotatedPath,
          colors: this.config.classColors,
          quality: this.config.faceQuality,
        });
        files.push(annotatedPath);
      }
    }

    if (this.config.contours && detectionCount > 0) {
      const contourPath = path.join(outputDir, OUTPUT_FILES.contours);
      await drawContours({
        panorama,
        contours: this.buildContours(detections, cubeSize, panorama),
        outputPath: contourPath,
        colors: this.config.classColors,
      });
      files.push(contourPath);
    }

    // 3. Azimuths
    const azimuths = computeAzimuths(detections, cubeSize);
    await write(OUTPUT_FILES.azimuths, azimuths);

    // 4. Distances
    const distances = await estimateDistances(faces, detections, this.deps.distanceEstimator, this.config.concurrency);
    await write(OUTPUT_FILES.distances, distances);

    // 5. Geocoding
    const origin = await this.deps.readOrigin(imagePath);
    let geocoded: GeocodedByFace | null = null;
    if (origin) {
      geocoded = joinDetections(origin, azimuths, distances);
      await write(OUTPUT_FILES.coords, geocoded);
      console.log(`   🗺️  ${countRecords(geocoded)} geocoded detection(s)`);
    } else {
      logErrorDetails('   ⚠️ Skipping coordinates: ', new MissingOriginError(imagePath));
    }

    return {
      image: imagePath,
      outputDir,
      status: origin ? 'complete' : 'incomplete',
      cubeSize,
      detections: detectionCount,
      geocoded: geocoded ? countRecords(geocoded) : 0,
      origin,
      files,
    };
  }

  /**
   * Images are processed in order; an image that fails is logged and
   * skipped, the rest of the batch still runs.
   */
  async run(imagePaths: string[]): Promise<RunSummary> {
    const summary: RunSummary = { processed: [], incomplete: [], skipped: [] };

    for (const imagePath of imagePaths) {
      try {
        const report = await this.processImage(imagePath);
        summary.processed.push(report);
        if (report.status === 'incomplete') summary.incomplete.push(imagePath);
      } catch (error) {
        const label = error instanceof ImageLoadError ? '❌ Could not load image: ' : `❌ Failed ${imagePath}: `;
        logErrorDetails(label, error);
        summary.skipped.push({ image: imagePath, reason: formatError(error) });
      }
    }

    return summary;
  }

  private async detectFaces(faces: RawImage[]): Promise<DetectionsByFace> {
    const lists = await runWithConcurrency([...FACES], this.config.concurrency, (face) =>
      this.deps.detector.detect(face, faces[face])
    );
    const result: DetectionsByFace = {};
    for (const face of FACES) {
      // bbox_index is the position in the face's list
      result[faceName(face)] = lists[face].map((det, index) => ({ ...det, bbox_index: index }));
    }
    return result;
  }

  private buildContours(detections: DetectionsByFace, cubeSize: number, panorama: RawImage): LabeledContour[] {
    const contours: LabeledContour[] = [];
    for (const face of FACES) {
      for (const det of detections[faceName(face)] ?? []) {
        contours.push({
          points: mapBoxToEquirect(face, det.box, {
            cubeSize,
            width: panorama.width,
            height: panorama.height,
            samplesPerEdge: this.config.contourSamples,
          }),
          classId: det.class_id,
          label: `${faceName(face)}#${det.bbox_index}`,
        });
      }
    }
    return contours;
  }
}

export function printSummary(summary: RunSummary): void {
  console.log(`\n📋 Summary`);
  console.log(`   Processed:  ${summary.processed.length}`);
  console.log(`   Incomplete: ${summary.incomplete.length}${summary.incomplete.length ? ' (no GPS origin)' : ''}`);
  for (const image of summary.incomplete) console.log(`     - ${image}`);
  console.log(`   Skipped:    ${summary.skipped.length}`);
  for (const s of summary.skipped) console.log(`     - ${s.image}: ${s.reason}`);
}
