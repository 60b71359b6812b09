import path from 'path';
import sharp from 'sharp';
import { IMAGE_MIME_TYPES, formatBytes } from './attachments';
import { ResumeGenerationError } from './errors';
import type { Attachment } from './types';

export type ImageNormalizerOptions = {
  maxSide: number;
  quality: number;
  maxBytes: number;
};

const DECODED_FORMAT_MIME: Record<string, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
};

function jpegFilename(filename: string | undefined): string | undefined {
  if (!filename) return undefined;
  const ext = path.extname(filename);
  return `${ext ? filename.slice(0, -ext.length) : filename}.jpg`;
}

async function readDimensions(attachment: Attachment): Promise<{ width: number; height: number; mimeType: string }> {
  const label = attachment.filename ?? 'image';
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(attachment.rawBytes).metadata();
  } catch (error) {
    throw new ResumeGenerationError('UnsupportedFormat', `${label} is not a readable image`, { cause: error });
  }

  const mimeType = metadata.format ? DECODED_FORMAT_MIME[metadata.format] : undefined;
  if (!mimeType) {
    throw new ResumeGenerationError(
      'UnsupportedFormat',
      `${label} is encoded as ${metadata.format ?? 'an unknown format'}; expected PNG, JPEG or WebP`,
    );
  }
  if (!metadata.width || !metadata.height) {
    throw new ResumeGenerationError('UnsupportedFormat', `${label} has no readable dimensions`);
  }
  return { width: metadata.width, height: metadata.height, mimeType };
}

/**
 * Returns an image that fits `maxSide` and `maxBytes`. Compliant images come back
 * as the same attachment; anything else is scaled (aspect ratio kept), flattened
 * onto white and re-encoded as JPEG into a new attachment.
 */
export async function normalizeImage(attachment: Attachment, options: ImageNormalizerOptions): Promise<Attachment> {
  if (attachment.kind !== 'image' || !IMAGE_MIME_TYPES.has(attachment.mimeType)) {
    throw new ResumeGenerationError('UnsupportedFormat', `Cannot normalize ${attachment.mimeType} as an image`);
  }

  const { width, height, mimeType } = await readDimensions(attachment);
  const longestSide = Math.max(width, height);

  if (longestSide <= options.maxSide && attachment.sizeBytes <= options.maxBytes) {
    if (mimeType === attachment.mimeType) return attachment;
    return Object.freeze({ ...attachment, mimeType });
  }

  let pipeline = sharp(attachment.rawBytes).flatten({ background: '#ffffff' });
  if (longestSide > options.maxSide) {
    pipeline = pipeline.resize({
      width: options.maxSide,
      height: options.maxSide,
      fit: 'inside',
      kernel: sharp.kernel.lanczos3,
    });
  }
  // The header read above does not decode pixel data; truncated bodies fail here.
  let output: Buffer;
  try {
    output = await pipeline.jpeg({ quality: options.quality }).toBuffer();
  } catch (error) {
    throw new ResumeGenerationError('UnsupportedFormat', `${attachment.filename ?? 'image'} could not be decoded`, {
      cause: error,
    });
  }

  if (output.byteLength > options.maxBytes) {
    throw new ResumeGenerationError(
      'PayloadTooLarge',
      `${attachment.filename ?? 'image'} is still ${formatBytes(output.byteLength)} after resizing to ${options.maxSide}px; the limit is ${formatBytes(options.maxBytes)}`,
    );
  }

  return Object.freeze({
    ...attachment,
    rawBytes: output,
    mimeType: 'image/jpeg',
    sizeBytes: output.byteLength,
    filename: jpegFilename(attachment.filename),
  });
}
