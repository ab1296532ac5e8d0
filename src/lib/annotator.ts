/**
 * SVG overlays: detection boxes on a face, projected contours on the panorama.
 */
import sharp from 'sharp';
import { isRenderableContour } from './contour';
import { applyOutputFormat, rawPipeline } from './image-io';
import type { EquirectPixel, FaceDetection, RawImage } from './types';

export const DEFAULT_CLASS_COLORS = ['#ff0000', '#00ff00', '#0000ff', '#ffff00', '#ff00ff', '#00ffff'];

export type OverlayOptions = {
  colors: string[];
};

export type LabeledContour = {
  points: EquirectPixel[];
  classId: number | null;
  label?: string;
};

export function colorForClass(classId: number | null, colors: string[]): string {
  if (colors.length === 0) return '#ffffff';
  const index = classId === null ? 0 : ((classId % colors.length) + colors.length) % colors.length;
  return colors[index];
}

function escapeXml(text: string) {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function detectionLabel(det: FaceDetection): string {
  const cls = det.class_id === null ? '?' : String(det.class_id);
  return det.score === null ? cls : `${cls}: ${det.score.toFixed(2)}`;
}

export function buildFaceSvg(width: number, height: number, detections: FaceDetection[], options: OverlayOptions): string {
  const fontSize = 10;
  const elements = detections
    .map((det) => {
      const [x1, y1, x2, y2] = det.box;
      const color = colorForClass(det.class_id, options.colors);
      const text = escapeXml(detectionLabel(det));
      const textY = Math.max(0, y1 - 12);
      return `
  <rect x="${x1.toFixed(1)}" y="${y1.toFixed(1)}" width="${(x2 - x1).toFixed(1)}" height="${(y2 - y1).toFixed(1)}" fill="none" stroke="${color}" stroke-width="3" />
  <rect x="${x1.toFixed(1)}" y="${textY.toFixed(1)}" width="${(text.length * 6).toFixed(1)}" height="12" fill="rgba(0,0,0,0.5)" />
  <text x="${x1.toFixed(1)}" y="${textY.toFixed(1)}" font-size="${fontSize}" font-family="system-ui, sans-serif" fill="${color}" dominant-baseline="hanging">${text}</text>
`;
    })
    .join('\n');

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${elements}
</svg>
`.trim();
}

export function buildContourSvg(width: number, height: number, contours: LabeledContour[], options: OverlayOptions): string {
  const thickness = Math.max(2, Math.round(Math.min(width, height) / 400));
  const elements = contours
    .filter((c) => isRenderableContour(c.points))
    .map((c) => {
      const color = colorForClass(c.classId, options.colors);
      const points = c.points.map((p) => `${p.x},${p.y}`).join(' ');
      const title = c.label ? `<title>${escapeXml(c.label)}</title>` : '';
      return `  <polygon points="${points}" fill="none" stroke="${color}" stroke-width="${thickness}">${title}</polygon>`;
    })
    .join('\n');

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${elements}
</svg>
`.trim();
}

async function compositeSvg(image: RawImage, svg: string, outputPath: string, quality: number): Promise<void> {
  const overlay = Buffer.from(svg);
  const pipeline: sharp.Sharp = rawPipeline(image).composite([{ input: overlay, top: 0, left: 0 }]);
  await applyOutputFormat(pipeline, outputPath, quality).toFile(outputPath);
}

export async function annotateFace(options: {
  face: RawImage;
  detections: FaceDetection[];
  outputPath: string;
  colors: string[];
  quality?: number;
}): Promise<void> {
  const svg = buildFaceSvg(options.face.width, options.face.height, options.detections, { colors: options.colors });
  await compositeSvg(options.face, svg, options.outputPath, options.quality ?? 95);
}

export async function drawContours(options: {
  panorama: RawImage;
  contours: LabeledContour[];
  outputPath: string;
  colors: string[];
  quality?: number;
}): Promise<void> {
  const svg = buildContourSvg(options.panorama.width, options.panorama.height, options.contours, {
    colors: options.colors,
  });
  await compositeSvg(options.panorama, svg, options.outputPath, options.quality ?? 90);
}
