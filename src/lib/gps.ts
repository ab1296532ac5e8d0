/**
 * Origin position from EXIF GPS tags.
 */
import * as exifr from 'exifr';
import fs from 'fs/promises';
import { z } from 'zod';
import { debugErrorsEnabled, ImageLoadError, logErrorDetails } from './errors';
import { inspectPanorama, PanoramaInfo } from './image-io';
import type { GeoPosition } from './types';

const DmsSchema = z.array(z.number()).min(1).max(3);

const GpsTagsSchema = z
  .object({
    GPSLatitude: DmsSchema,
    GPSLatitudeRef: z.string().optional(),
    GPSLongitude: DmsSchema,
    GPSLongitudeRef: z.string().optional(),
    GPSAltitude: z.number().optional(),
    GPSAltitudeRef: z.union([z.number(), z.instanceof(Uint8Array)]).optional(),
  })
  .passthrough();

export type Dms = number[];

/**
 * degrees + minutes/60 + seconds/3600, negated for S and W references.
 */
export function dmsToDecimal(dms: Dms, ref?: string): number {
  const [degrees = 0, minutes = 0, seconds = 0] = dms;
  const decimal = degrees + minutes / 60 + seconds / 3600;
  const hemisphere = (ref ?? '').trim().toUpperCase();
  return hemisphere === 'S' || hemisphere === 'W' ? -decimal : decimal;
}

function isBelowSeaLevel(ref: number | Uint8Array | undefined): boolean {
  if (ref === undefined) return false;
  return typeof ref === 'number' ? ref === 1 : ref[0] === 1;
}

/**
 * GeoPosition from parsed GPS tags, or null when latitude/longitude are absent.
 */
export function originFromGpsTags(tags: unknown): GeoPosition | null {
  const parsed = GpsTagsSchema.safeParse(tags);
  if (!parsed.success) return null;

  const gps = parsed.data;
  const position: GeoPosition = {
    latitude: dmsToDecimal(gps.GPSLatitude, gps.GPSLatitudeRef ?? 'N'),
    longitude: dmsToDecimal(gps.GPSLongitude, gps.GPSLongitudeRef ?? 'E'),
  };
  if (gps.GPSAltitude !== undefined) {
    position.altitude = isBelowSeaLevel(gps.GPSAltitudeRef) ? -gps.GPSAltitude : gps.GPSAltitude;
  }
  if (!Number.isFinite(position.latitude) || !Number.isFinite(position.longitude)) return null;
  return position;
}

async function readBytes(imagePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(imagePath);
  } catch (error) {
    throw new ImageLoadError(imagePath, { cause: error });
  }
}

async function parseExif(bytes: Buffer): Promise<unknown> {
  try {
    return await exifr.parse(bytes, { tiff: true, gps: true, exif: true, xmp: false, icc: false, iptc: false });
  } catch (error) {
    // unreadable metadata counts as untagged
    if (debugErrorsEnabled()) logErrorDetails('⚠️ Could not parse EXIF: ', error);
    return undefined;
  }
}

/**
 * Origin of the panorama, or null when it carries no GPS position.
 */
export async function readOrigin(imagePath: string): Promise<GeoPosition | null> {
  const bytes = await readBytes(imagePath);
  return originFromGpsTags(await parseExif(bytes));
}

// ==========================================
// METADATA SUMMARY
// ==========================================

const CameraTagsSchema = z
  .object({
    Make: z.string().optional(),
    Model: z.string().optional(),
    Software: z.string().optional(),
    DateTimeOriginal: z.union([z.date(), z.string()]).optional(),
    ImageDescription: z.string().optional(),
  })
  .passthrough();

export type ImageMetadata = {
  file_path: string;
  file_size: number;
  extraction_time: string;
  image: PanoramaInfo;
  has_gps_data: boolean;
  gps_coordinates: GeoPosition | null;
  camera: {
    make: string | null;
    model: string | null;
    software: string | null;
    captured_at: string | null;
    description: string | null;
  };
};

export async function extractImageMetadata(imagePath: string): Promise<ImageMetadata> {
  const bytes = await readBytes(imagePath);
  const image = await inspectPanorama(bytes);
  const tags = await parseExif(bytes);
  const origin = originFromGpsTags(tags);
  const camera = CameraTagsSchema.safeParse(tags ?? {});
  const cam = camera.success ? camera.data : CameraTagsSchema.parse({});
  const captured = cam.DateTimeOriginal;

  return {
    file_path: imagePath,
    file_size: bytes.length,
    extraction_time: new Date().toISOString(),
    image,
    has_gps_data: origin !== null,
    gps_coordinates: origin,
    camera: {
      make: cam.Make ?? null,
      model: cam.Model ?? null,
      software: cam.Software ?? null,
      captured_at: captured instanceof Date ? captured.toISOString() : captured ?? null,
      description: cam.ImageDescription ?? null,
    },
  };
}
