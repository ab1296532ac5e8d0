#!/usr/bin/env npx tsx
/**
 * Equirectangular panorama -> six cube face images (+ cross layout)
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { logErrorDetails } from '../src/lib/errors';
import { faceName } from '../src/lib/geometry';
import { loadPanorama, saveRawImage } from '../src/lib/image-io';
import { composeCrossLayout, defaultCubeSize, extractCubeFaces } from '../src/lib/rasterizer';
import { FACES } from '../src/lib/types';

dotenv.config();

const DEFAULT_OUTPUT_DIR = 'cubemap_output';
const DEFAULT_FACE_QUALITY = Number(process.env.FACE_QUALITY || 95);

function printHelp() {
  console.log(`
Usage: npx tsx scripts/convert-cubemap.ts -i <panorama> [options]

Options:
  -i, --image <path>        Equirectangular 360° image
  -o, --output-dir <dir>    Output directory (default: ${DEFAULT_OUTPUT_DIR})
  -c, --cube-size <px>      Face size (default: panorama width / 4)
      --no-cross            Skip cubemap_cross.jpg
  -h, --help                Show help
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
  outputDir: string;
  cubeSize: number | null;
  cross: boolean;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    imagePath: '',
    outputDir: DEFAULT_OUTPUT_DIR,
    cubeSize: null,
    cross: true,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output-dir':
        config.outputDir = requireValue(args, i, arg);
        i++;
        break;
      case '-c':
      case '--cube-size': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isInteger(value) || value < 16 || value > 16384) {
          console.error(`❌ Invalid value for ${arg}: ${args[i + 1]} (must be 16-16384)`);
          process.exit(1);
        }
        config.cubeSize = value;
        i++;
        break;
      }
      case '--no-cross':
        config.cross = false;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if (!config.imagePath) {
    console.error(`❌ No input specified. Usage: npx tsx scripts/convert-cubemap.ts -i <panorama>`);
    process.exit(1);
  }
  return config;
}

async function main() {
  const config = parseArgs();

  const panorama = await loadPanorama(config.imagePath);
  const cubeSize = config.cubeSize ?? defaultCubeSize(panorama.width);
  console.log(`🌐 Loaded ${panorama.width}x${panorama.height}, face size ${cubeSize}x${cubeSize}`);

  fs.mkdirSync(config.outputDir, { recursive: true });
  const faces = extractCubeFaces(panorama, cubeSize);
  for (const face of FACES) {
    const outPath = path.join(config.outputDir, `${faceName(face)}.jpg`);
    await saveRawImage(faces[face], outPath, DEFAULT_FACE_QUALITY);
    console.log(`   [${face + 1}/6] ${outPath}`);
  }

  if (config.cross) {
    const crossPath = path.join(config.outputDir, 'cubemap_cross.jpg');
    await saveRawImage(composeCrossLayout(faces), crossPath, DEFAULT_FACE_QUALITY);
    console.log(`   Cross layout: ${crossPath}`);
  }

  console.log(`\n🎉 Done! See ${config.outputDir}/`);
}

main().catch((error: unknown) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
