// Cube faces in index order: front=+Z, right=+X, back=-Z, left=-X, up=+Y, down=-Y
export const FACE_NAMES = ['front', 'right', 'back', 'left', 'up', 'down'] as const;

export type FaceName = (typeof FACE_NAMES)[number];
export type Face = 0 | 1 | 2 | 3 | 4 | 5;

export const FACES: readonly Face[] = [0, 1, 2, 3, 4, 5];

export type Vec3 = [number, number, number];

export type SphericalAngles = {
  theta: number; // latitude, (-π/2, π/2)
  phi: number; // longitude, (-π, π], 0 at +Z, increasing toward +X
};

export type EquirectPixel = { x: number; y: number };

export type Box2D = [number, number, number, number]; // [x1, y1, x2, y2] in face pixels

export type FaceDetection = {
  bbox_index: number;
  box: Box2D;
  class_id: number | null;
  score: number | null;
};

export type AzimuthRecord = {
  bbox_index: number;
  class_id: number | null;
  azimuth_deg: number;
};

export type DistanceRecord = {
  bbox_index: number;
  class_id: number | null;
  score: number | null;
  distance_m: number | null;
};

export type GeoPosition = {
  latitude: number;
  longitude: number;
  altitude?: number;
};

export type GeocodedDetection = {
  bbox_index: number;
  class_id: number | null;
  score: number | null;
  azimuth_deg: number;
  distance_m: number;
  latitude: number;
  longitude: number;
};

export type PerFace<T> = Partial<Record<FaceName, T>>;

export type DetectionsByFace = PerFace<FaceDetection[]>;
export type AzimuthsByFace = PerFace<AzimuthRecord[]>;
export type DistancesByFace = PerFace<DistanceRecord[]>;
export type GeocodedByFace = PerFace<GeocodedDetection[]>;

export type Channels = 1 | 2 | 3 | 4;

/** Interleaved 8-bit pixels, row-major. */
export type RawImage = {
  data: Uint8Array;
  width: number;
  height: number;
  channels: Channels;
};
