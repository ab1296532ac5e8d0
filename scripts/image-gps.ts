#!/usr/bin/env npx tsx
/**
 * Print image metadata and GPS position; optionally dump it as JSON.
 */
import { logErrorDetails } from '../src/lib/errors';
import { extractImageMetadata, ImageMetadata } from '../src/lib/gps';
import { writeJsonFile } from '../src/lib/records';

function printSummary(metadata: ImageMetadata) {
  const { image, camera } = metadata;
  console.log('='.repeat(60));
  console.log('360 IMAGE METADATA');
  console.log('='.repeat(60));
  console.log(`File:       ${metadata.file_path}`);
  console.log(`Size:       ${metadata.file_size} bytes`);
  console.log(`Format:     ${image.format ?? 'unknown'}`);
  console.log(`Dimensions: ${image.width}x${image.height}`);

  console.log('\n--- 360 ---');
  console.log(`Aspect ratio: ${image.aspectRatio.toFixed(3)}`);
  console.log(image.possibleEquirectangular ? 'Looks equirectangular (2:1)' : 'Not 2:1, probably not equirectangular');

  console.log('\n--- GEOLOCATION ---');
  const coords = metadata.gps_coordinates;
  if (coords) {
    console.log('✅ Image HAS GPS data');
    console.log(`Latitude:  ${coords.latitude.toFixed(6)}`);
    console.log(`Longitude: ${coords.longitude.toFixed(6)}`);
    if (coords.altitude !== undefined) console.log(`Altitude:  ${coords.altitude.toFixed(2)} m`);
    console.log(`Map: https://www.google.com/maps?q=${coords.latitude},${coords.longitude}`);
  } else {
    console.log('❌ Image has NO GPS data');
  }

  console.log('\n--- CAMERA ---');
  if (camera.make) console.log(`Make:     ${camera.make}`);
  if (camera.model) console.log(`Model:    ${camera.model}`);
  if (camera.software) console.log(`Software: ${camera.software}`);
  if (camera.captured_at) console.log(`Captured: ${camera.captured_at}`);
  if (camera.description) console.log(`Description: ${camera.description}`);
}

async function main() {
  const args = process.argv.slice(2);
  if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
    console.log('Usage: npx tsx scripts/image-gps.ts <image> [--json output.json]');
    process.exit(args.length === 0 ? 1 : 0);
  }

  const imagePath = args[0];
  const jsonIndex = args.indexOf('--json');
  const jsonOutput = jsonIndex === -1 ? null : args[jsonIndex + 1] ?? 'metadata.json';

  const metadata = await extractImageMetadata(imagePath);
  printSummary(metadata);

  if (jsonOutput) {
    await writeJsonFile(jsonOutput, metadata);
    console.log(`\nFull metadata saved to ${jsonOutput}`);
  }
}

main().catch((error: unknown) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
