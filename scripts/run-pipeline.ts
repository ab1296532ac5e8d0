#!/usr/bin/env npx tsx
/**
 * Batch pipeline for 360° panoramas: cubemap, detection, azimuths,
 * distances and GPS coordinates.
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { DEFAULT_CLASS_COLORS } from '../src/lib/annotator';
import { FaceDetector, FileDetections, GeminiFaceDetector } from '../src/lib/detector';
import { DistanceEstimator, FileDistances, GeminiDistanceEstimator } from '../src/lib/distance';
import { createAIPool } from '../src/lib/pool';
import { listPanoramas, PanoramaPipeline, PipelineConfig, printSummary } from '../src/lib/pipeline';
import { parseDetectionsFile, parseDistancesFile, readJsonFile } from '../src/lib/records';

dotenv.config();

// Defaults from environment
const DEFAULT_IMAGES_DIR = process.env.IMAGES_DIR || 'images';
const DEFAULT_OUTPUT_ROOT = process.env.OUTPUT_ROOT || '.';
const DEFAULT_CUBE_SIZE = process.env.CUBE_SIZE ? Number(process.env.CUBE_SIZE) : null;
const DEFAULT_FACE_QUALITY = Number(process.env.FACE_QUALITY || 95);
const DEFAULT_CONCURRENCY = Number(process.env.CONCURRENCY || 6);
const DEFAULT_CONTOUR_SAMPLES = Number(process.env.CONTOUR_SAMPLES || 20);
const DEFAULT_MODEL_NAME = process.env.MODEL_NAME || 'gemini-2.5-flash';
const DEFAULT_DISTANCE_MODEL_NAME = process.env.DISTANCE_MODEL_NAME || DEFAULT_MODEL_NAME;
const DEFAULT_LABELS = process.env.LABELS || 'utility pole,traffic sign,street light,tree,fire hydrant';
const DEBUG = process.env.DEBUG === '1' || process.env.DEBUG === 'true';

function printHelp() {
  console.log(`
Usage: npx tsx scripts/run-pipeline.ts [options]
       npx tsx scripts/run-pipeline.ts -i <panorama> [options]

Processes every .jpg/.jpeg/.png in the images directory (or a single image):
  1. cube faces (front, right, back, left, up, down) + cross layout
  2. object detection on each face
  3. azimuth of every detection
  4. distance of every detection
  5. GPS coordinates from the panorama's EXIF origin

Options:
  -i, --image <path>            Process only this image (path or name in the images dir)
  -c, --cube-size <px>          Face size (default: panorama width / 4)
      --images-dir <dir>        Panorama directory (default: ${DEFAULT_IMAGES_DIR})
      --output-root <dir>       Root for output_<name>/ folders (default: ${DEFAULT_OUTPUT_ROOT})
      --detections <file>       Use an existing detections.json instead of the model (single image)
      --distances <file>        Use an existing distances.json instead of the model (single image)
      --labels <a,b,c>          Object kinds to detect; class id = position (default: ${DEFAULT_LABELS})
      --model <name>            Detection model (default: ${DEFAULT_MODEL_NAME})
      --distance-model <name>   Distance model (default: ${DEFAULT_DISTANCE_MODEL_NAME})
      --concurrency <n>         Max concurrent model calls (default: ${DEFAULT_CONCURRENCY})
      --quality <n>             JPEG quality for faces (default: ${DEFAULT_FACE_QUALITY})
      --contour-samples <n>     Samples per box edge for contours (default: ${DEFAULT_CONTOUR_SAMPLES})
      --no-cross                Skip the cross layout image
      --no-annotate             Skip annotated face images
      --no-contours             Skip the panorama contour overlay
  -h, --help                    Show help
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

function requireInt(args: string[], index: number, flag: string, min: number, max: number): number {
  const value = Number(requireValue(args, index, flag));
  if (!Number.isInteger(value) || value < min || value > max) {
    console.error(`❌ Invalid value for ${flag}: ${args[index + 1]} (must be ${min}-${max})`);
    process.exit(1);
  }
  return value;
}

type CLIConfig = PipelineConfig & {
  image: string | null;
  imagesDir: string;
  detectionsFile: string | null;
  distancesFile: string | null;
  labels: string[];
  modelName: string;
  distanceModelName: string;
};

function parseLabels(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    image: null,
    imagesDir: DEFAULT_IMAGES_DIR,
    outputRoot: DEFAULT_OUTPUT_ROOT,
    cubeSize: DEFAULT_CUBE_SIZE,
    faceQuality: DEFAULT_FACE_QUALITY,
    concurrency: DEFAULT_CONCURRENCY,
    crossLayout: true,
    annotateFaces: true,
    contours: true,
    contourSamples: DEFAULT_CONTOUR_SAMPLES,
    classColors: DEFAULT_CLASS_COLORS,
    detectionsFile: null,
    distancesFile: null,
    labels: parseLabels(DEFAULT_LABELS),
    modelName: DEFAULT_MODEL_NAME,
    distanceModelName: DEFAULT_DISTANCE_MODEL_NAME,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.image = requireValue(args, i, arg);
        i++;
        break;
      case '-c':
      case '--cube-size':
        config.cubeSize = requireInt(args, i, arg, 16, 16384);
        i++;
        break;
      case '--images-dir':
        config.imagesDir = requireValue(args, i, arg);
        i++;
        break;
      case '--output-root':
        config.outputRoot = requireValue(args, i, arg);
        i++;
        break;
      case '--detections':
        config.detectionsFile = requireValue(args, i, arg);
        i++;
        break;
      case '--distances':
        config.distancesFile = requireValue(args, i, arg);
        i++;
        break;
      case '--labels': {
        const labels = parseLabels(requireValue(args, i, arg));
        if (labels.length === 0) {
          console.error(`❌ ${arg} needs at least one label`);
          process.exit(1);
        }
        config.labels = labels;
        i++;
        break;
      }
      case '--model':
        config.modelName = requireValue(args, i, arg);
        i++;
        break;
      case '--distance-model':
        config.distanceModelName = requireValue(args, i, arg);
        i++;
        break;
      case '--concurrency':
        config.concurrency = requireInt(args, i, arg, 1, 20);
        i++;
        break;
      case '--quality':
        config.faceQuality = requireInt(args, i, arg, 1, 100);
        i++;
        break;
      case '--contour-samples':
        config.contourSamples = requireInt(args, i, arg, 1, 1000);
        i++;
        break;
      case '--no-cross':
        config.crossLayout = false;
        break;
      case '--no-annotate':
        config.annotateFaces = false;
        break;
      case '--no-contours':
        config.contours = false;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if ((config.detectionsFile || config.distancesFile) && !config.image) {
    console.error(`❌ --detections and --distances need a single image (-i).`);
    process.exit(1);
  }

  return config;
}

function resolveImages(config: CLIConfig): string[] {
  if (config.image) {
    const candidates = [config.image, path.join(config.imagesDir, config.image)];
    const found = candidates.find((p) => fs.existsSync(p) && fs.statSync(p).isFile());
    if (!found) {
      console.error(`❌ Image not found: ${config.image}`);
      process.exit(1);
    }
    return [found];
  }
  if (!fs.existsSync(config.imagesDir)) {
    console.error(`❌ Images directory not found: ${config.imagesDir}`);
    process.exit(1);
  }
  return listPanoramas(config.imagesDir);
}

async function main() {
  const config = parseArgs();
  const images = resolveImages(config);
  if (images.length === 0) {
    console.warn(`⚠️ No panoramas found in ${config.imagesDir}`);
    return;
  }

  let detector: FaceDetector;
  if (config.detectionsFile) {
    detector = new FileDetections(parseDetectionsFile(await readJsonFile(config.detectionsFile)));
  } else {
    const pool = createAIPool({ maxConcurrency: config.concurrency, model: config.modelName, debug: DEBUG });
    detector = new GeminiFaceDetector(pool, config.labels);
  }

  let distanceEstimator: DistanceEstimator;
  if (config.distancesFile) {
    distanceEstimator = new FileDistances(parseDistancesFile(await readJsonFile(config.distancesFile)));
  } else {
    const pool = createAIPool({ maxConcurrency: config.concurrency, model: config.distanceModelName, debug: DEBUG });
    distanceEstimator = new GeminiDistanceEstimator(pool, config.labels);
  }

  console.log(`🚀 Processing ${images.length} panorama(s)`);
  const { image, imagesDir, detectionsFile, distancesFile, labels, modelName, distanceModelName, ...pipelineConfig } =
    config;
  const pipeline = new PanoramaPipeline(pipelineConfig, { detector, distanceEstimator });
  const summary = await pipeline.run(images);
  printSummary(summary);
  console.log(`\n🎉 Done!`);
}

main().catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
