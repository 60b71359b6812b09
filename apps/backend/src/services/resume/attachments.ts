import path from 'path';
import { ResumeGenerationError } from './errors';
import type { Attachment, AttachmentKind, RawAttachment } from './types';

export const IMAGE_MIME_TYPES: ReadonlySet<string> = new Set(['image/png', 'image/jpeg', 'image/webp']);
export const DOCUMENT_MIME_TYPES: ReadonlySet<string> = new Set(['application/pdf']);

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.pdf': 'application/pdf',
};

export function guessMimeType(filename: string): string {
  return EXTENSION_MIME_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/** Lower-cases, drops parameters and folds the `image/jpg` alias. */
export function normalizeMimeType(mimeType: string, filename?: string): string {
  const base = mimeType.split(';')[0].trim().toLowerCase();
  if (base === 'image/jpg' || base === 'image/pjpeg') return 'image/jpeg';
  if ((!base || base === 'application/octet-stream') && filename) return guessMimeType(filename);
  return base;
}

export function classifyMimeType(mimeType: string): AttachmentKind | null {
  if (IMAGE_MIME_TYPES.has(mimeType)) return 'image';
  if (DOCUMENT_MIME_TYPES.has(mimeType)) return 'document';
  return null;
}

export function formatBytes(bytes: number): string {
  return `${bytes.toLocaleString('en-US')} bytes`;
}

export function createAttachment(raw: RawAttachment, maxFileBytes: number): Attachment {
  const mimeType = normalizeMimeType(raw.mimeType, raw.filename);
  const kind = classifyMimeType(mimeType);
  const label = raw.filename ?? 'attachment';

  if (!kind) {
    throw new ResumeGenerationError('UnsupportedFormat', `Unsupported file type "${mimeType}" for ${label}`);
  }
  if (raw.bytes.byteLength > maxFileBytes) {
    throw new ResumeGenerationError(
      'PayloadTooLarge',
      `${label} is ${formatBytes(raw.bytes.byteLength)}; the limit is ${formatBytes(maxFileBytes)}`,
    );
  }

  return Object.freeze({
    kind,
    rawBytes: raw.bytes,
    mimeType,
    sizeBytes: raw.bytes.byteLength,
    filename: raw.filename,
    role: raw.role ?? 'context',
  });
}
