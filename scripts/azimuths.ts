#!/usr/bin/env npx tsx
/**
 * detections.json + face size (or the source panorama) -> azimuths.json
 */
import dotenv from 'dotenv';
import { azimuthsFromDetectionsFile } from '../src/lib/azimuth';
import { logErrorDetails } from '../src/lib/errors';
import { inspectPanorama } from '../src/lib/image-io';
import { countRecords } from '../src/lib/join';
import { defaultCubeSize } from '../src/lib/rasterizer';
import { readJsonFile, writeJsonFile } from '../src/lib/records';

dotenv.config();

const DEFAULT_CUBE_SIZE = process.env.CUBE_SIZE ? Number(process.env.CUBE_SIZE) : null;

function printHelp() {
  console.log(`
Usage: npx tsx scripts/azimuths.ts -i <panorama> [options]
       npx tsx scripts/azimuths.ts -c <px> [options]

Options:
  -i, --image <path>         Source panorama; face size = width / 4
  -c, --cube-size <px>       Face size the detections were made on (overrides --image)
  -d, --detections <file>    Detections JSON (default: cubemap_output/detections.json)
  -o, --output <file>        Output JSON (default: cubemap_output/azimuths.json)
  -h, --help                 Show help
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

type CLIConfig = {
  imagePath: string;
  cubeSize: number | null;
  detections: string;
  output: string;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    imagePath: '',
    cubeSize: DEFAULT_CUBE_SIZE,
    detections: 'cubemap_output/detections.json',
    output: 'cubemap_output/azimuths.json',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-c':
      case '--cube-size': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isInteger(value) || value < 1 || value > 16384) {
          console.error(`❌ Invalid value for ${arg}: ${args[i + 1]} (must be 1-16384)`);
          process.exit(1);
        }
        config.cubeSize = value;
        i++;
        break;
      }
      case '-d':
      case '--detections':
        config.detections = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output':
        config.output = requireValue(args, i, arg);
        i++;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if (config.cubeSize === null && !config.imagePath) {
    console.error(`❌ Give the panorama (-i) or the face size (-c).`);
    process.exit(1);
  }
  return config;
}

async function main() {
  const config = parseArgs();

  let cubeSize = config.cubeSize;
  if (cubeSize === null) {
    const info = await inspectPanorama(config.imagePath);
    cubeSize = defaultCubeSize(info.width);
    console.log(`🌐 ${config.imagePath}: ${info.width}x${info.height}, face size ${cubeSize}px`);
  }

  const azimuths = azimuthsFromDetectionsFile(await readJsonFile(config.detections), cubeSize);
  await writeJsonFile(config.output, azimuths);
  console.log(`🧭 ${countRecords(azimuths)} azimuth(s) saved to ${config.output}`);
}

main().catch((error: unknown) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
