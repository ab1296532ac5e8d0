#!/usr/bin/env npx tsx
/**
 * azimuths.json + distances.json + panorama GPS origin -> coords.json
 */
import dotenv from 'dotenv';
import { logErrorDetails, MissingOriginError } from '../src/lib/errors';
import { readOrigin } from '../src/lib/gps';
import { countRecords, joinDetections } from '../src/lib/join';
import { parseAzimuthsFile, parseDistancesFile, readJsonFile, writeJsonFile } from '../src/lib/records';
import type { GeoPosition } from '../src/lib/types';

dotenv.config();

function printHelp() {
  console.log(`
Usage: npx tsx scripts/geocode.ts -i <panorama> [options]
       npx tsx scripts/geocode.ts --lat <deg> --lon <deg> [options]

Options:
  -i, --image <path>       Panorama whose EXIF GPS is the origin
  -a, --azimuths <file>    Azimuths JSON (default: cubemap_output/azimuths.json)
  -d, --distances <file>   Distances JSON (default: cubemap_output/distances.json)
  -o, --output <file>      Output JSON (default: cubemap_output/coords.json)
      --lat <deg>          Origin latitude (overrides EXIF)
      --lon <deg>          Origin longitude (overrides EXIF)
  -h, --help               Show help
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  // negative coordinates are values, not flags
  if (!value || (value.startsWith('-') && Number.isNaN(Number(value)))) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

function requireCoordinate(args: string[], index: number, flag: string, limit: number): number {
  const value = Number(requireValue(args, index, flag));
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    console.error(`❌ Invalid value for ${flag}: ${args[index + 1]} (must be within ±${limit})`);
    process.exit(1);
  }
  return value;
}

type CLIConfig = {
  imagePath: string;
  azimuths: string;
  distances: string;
  output: string;
  lat: number | null;
  lon: number | null;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    imagePath: '',
    azimuths: 'cubemap_output/azimuths.json',
    distances: 'cubemap_output/distances.json',
    output: 'cubemap_output/coords.json',
    lat: null,
    lon: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-a':
      case '--azimuths':
        config.azimuths = requireValue(args, i, arg);
        i++;
        break;
      case '-d':
      case '--distances':
        config.distances = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output':
        config.output = requireValue(args, i, arg);
        i++;
        break;
      case '--lat':
        config.lat = requireCoordinate(args, i, arg, 90);
        i++;
        break;
      case '--lon':
        config.lon = requireCoordinate(args, i, arg, 180);
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

  if ((config.lat === null) !== (config.lon === null)) {
    console.error(`❌ --lat and --lon must be given together.`);
    process.exit(1);
  }
  if (!config.imagePath && config.lat === null) {
    console.error(`❌ Give a panorama (-i) or an origin (--lat/--lon).`);
    process.exit(1);
  }
  return config;
}

async function main() {
  const config = parseArgs();

  let origin: GeoPosition | null = null;
  if (config.lat !== null && config.lon !== null) {
    origin = { latitude: config.lat, longitude: config.lon };
  } else {
    origin = await readOrigin(config.imagePath);
  }
  if (!origin) {
    logErrorDetails('⚠️ ', new MissingOriginError(config.imagePath));
    process.exit(2);
  }

  const azimuths = parseAzimuthsFile(await readJsonFile(config.azimuths));
  const distances = parseDistancesFile(await readJsonFile(config.distances));
  const geocoded = joinDetections(origin, azimuths, distances);

  await writeJsonFile(config.output, geocoded);
  console.log(`🗺️  Origin ${origin.latitude.toFixed(6)}, ${origin.longitude.toFixed(6)}`);
  console.log(`   ${countRecords(geocoded)} of ${countRecords(azimuths)} detection(s) geocoded`);
  console.log(`   Saved coordinates to ${config.output}`);
}

main().catch((error: unknown) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
