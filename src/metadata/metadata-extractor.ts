/**
 * Capture metadata for uploads.
 *
 * The extractor reads camera make/model and the original capture time from
 * embedded EXIF; the resolver turns that (plus the file's mtime) into the
 * UploadMetadata form fields. Missing tags never fail an upload: they
 * degrade to the file mtime and the configured device id.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import sharp from 'sharp';
import exifReader from 'exif-reader';
import type { UploadMetadata } from '../client/types.js';
import { extensionOf } from '../client/media-types.js';
import { FileReadError, MetadataExtractionError, toError } from '../errors.js';

/** Tags read from a file; every field is optional */
export interface CaptureMetadata {
  capturedAt?: Date;
  make?: string;
  model?: string;
}

export interface MetadataExtractor {
  /**
   * @throws MetadataExtractionError when embedded metadata exists but cannot be parsed
   */
  extract(filePath: string): Promise<CaptureMetadata>;
}

/** Formats whose EXIF block sharp can expose */
export const EXIF_CAPABLE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.jpe',
  '.tif',
  '.tiff',
  '.png',
  '.webp',
  '.avif',
]);

type TagGroup = ReadonlyMap<string, unknown>;

function entriesOf(value: unknown): TagGroup | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || Buffer.isBuffer(value)) {
    return undefined;
  }
  return new Map<string, unknown>(Object.entries(value));
}

function group(exif: unknown, ...names: string[]): TagGroup {
  const record = entriesOf(exif);
  if (!record) return new Map();
  for (const name of names) {
    const tags = entriesOf(record.get(name));
    if (tags) return tags;
  }
  return new Map();
}

function asText(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  // EXIF ASCII fields are NUL padded
  const cleaned = value.replace(/\0+$/, '').trim();
  return cleaned || undefined;
}

function asDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'string') {
    // "YYYY:MM:DD HH:MM:SS"
    const match = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})/.exec(value);
    if (!match) return undefined;
    const [, y, mo, d, h, mi, s] = match;
    const date = new Date(`${y}-${mo}-${d}T${h}:${mi}:${s}Z`);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

/**
 * Pick capture fields out of a decoded EXIF object. Accepts both the
 * current (`Image`/`Photo`) and the older (`image`/`exif`) group names.
 */
export function captureMetadataFromExif(exif: unknown): CaptureMetadata {
  const image = group(exif, 'Image', 'image');
  const photo = group(exif, 'Photo', 'exif');

  const result: CaptureMetadata = {};
  const capturedAt =
    asDate(photo.get('DateTimeOriginal')) ?? asDate(photo.get('DateTimeDigitized')) ?? asDate(image.get('DateTime'));
  const make = asText(image.get('Make'));
  const model = asText(image.get('Model'));

  if (capturedAt) result.capturedAt = capturedAt;
  if (make) result.make = make;
  if (model) result.model = model;
  return result;
}

/** Reads EXIF with sharp and decodes it with exif-reader */
export class ExifMetadataExtractor implements MetadataExtractor {
  async extract(filePath: string): Promise<CaptureMetadata> {
    if (!EXIF_CAPABLE_EXTENSIONS.has(extensionOf(filePath))) {
      return {};
    }

    let exifBlock: Buffer | undefined;
    try {
      const info = await sharp(filePath).metadata();
      exifBlock = info.exif;
    } catch (err) {
      throw new MetadataExtractionError(filePath, `Cannot read metadata of ${filePath}: ${toError(err).message}`, {
        cause: err,
      });
    }

    if (!exifBlock || exifBlock.length === 0) {
      return {};
    }

    let decoded: unknown;
    try {
      decoded = exifReader(exifBlock);
    } catch (err) {
      throw new MetadataExtractionError(filePath, `Malformed EXIF in ${filePath}: ${toError(err).message}`, {
        cause: err,
      });
    }
    return captureMetadataFromExif(decoded);
  }
}

export interface MetadataResolverOptions {
  extractor: MetadataExtractor;
  /** Owner tag used when the file names no camera */
  deviceId: string;
  /** Receives a warning when tags cannot be parsed */
  logger?: Logger;
}

/** Builds the upload form fields for one file */
export type MetadataResolver = (filePath: string) => Promise<UploadMetadata>;

/** File name without its last extension */
export function deviceAssetIdOf(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Create the `metadataOf(path)` function used by every upload.
 *
 * Unparseable tags degrade to the mtime and device id; only a file that
 * cannot be stat'ed fails.
 *
 * @throws FileReadError if the file cannot be stat'ed
 */
export function createMetadataResolver(options: MetadataResolverOptions): MetadataResolver {
  return async (filePath: string): Promise<UploadMetadata> => {
    let modifiedAt: Date;
    try {
      const stats = await fs.stat(filePath);
      modifiedAt = stats.mtime;
    } catch (err) {
      throw new FileReadError(filePath, `Cannot stat ${filePath}: ${toError(err).message}`, { cause: err });
    }

    let capture: CaptureMetadata = {};
    try {
      capture = await options.extractor.extract(filePath);
    } catch (err) {
      if (!(err instanceof MetadataExtractionError)) throw err;
      options.logger?.warn({ path: filePath, err }, 'Ignoring unreadable capture metadata');
    }
    const camera = [capture.make, capture.model].filter(Boolean).join('').trim();

    return {
      deviceAssetId: deviceAssetIdOf(filePath),
      deviceOwnerTag: camera || options.deviceId,
      contentCreatedAt: capture.capturedAt ?? modifiedAt,
      contentModifiedAt: modifiedAt,
    };
  };
}
