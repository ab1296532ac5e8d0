/**
 * Error kinds raised by the geometry and pipeline modules, plus the
 * one-line formatter used by every script when logging a failure.
 */

export class InvalidFaceError extends Error {
  readonly face: unknown;

  constructor(face: unknown) {
    super(`Invalid face: ${String(face)} (expected 0-5 or front|right|back|left|up|down)`);
    this.name = 'InvalidFaceError';
    this.face = face;
  }
}

export class NonFiniteInputError extends Error {
  constructor(what: string, value: number) {
    super(`${what} must be a finite number, got ${value}`);
    this.name = 'NonFiniteInputError';
  }
}

export class ImageLoadError extends Error {
  readonly imagePath: string;

  constructor(imagePath: string, options?: { cause?: unknown }) {
    super(`Unable to load image: ${imagePath}`, options);
    this.name = 'ImageLoadError';
    this.imagePath = imagePath;
  }
}

export class MissingOriginError extends Error {
  readonly imagePath: string;

  constructor(imagePath: string) {
    super(`No GPS EXIF data found in ${imagePath}`);
    this.name = 'MissingOriginError';
    this.imagePath = imagePath;
  }
}

export function assertFinite(what: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new NonFiniteInputError(what, value);
  }
}

// ==========================================
// FORMATTING
// ==========================================

export function debugErrorsEnabled(): boolean {
  const flag = process.env.DEBUG_ERRORS;
  return flag === '1' || flag === 'true' || flag === 'yes';
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status = readField(error, 'statusCode') ?? readField(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    const code = readField(error, 'code');
    if (code) parts.push(`code=${String(code)}`);
    const status = statusOf(error);
    if (status !== undefined) parts.push(`status=${status}`);
    if (error instanceof ImageLoadError || error instanceof MissingOriginError) {
      parts.push(`path=${error.imagePath}`);
    }
    if (error.cause) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (debugErrorsEnabled() && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}
