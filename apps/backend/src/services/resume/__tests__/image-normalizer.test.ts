import { describe, test, expect } from '@jest/globals';
import sharp from 'sharp';
import { createAttachment } from '../attachments';
import { normalizeImage } from '../image-normalizer';
import { makeJpeg, makePng } from './fixtures';

const options = { maxSide: 2048, quality: 85, maxBytes: 8_000_000 };

describe('normalizeImage', () => {
  test('returns a compliant image untouched', async () => {
    const attachment = createAttachment({ bytes: await makePng(100, 50), mimeType: 'image/png' }, options.maxBytes);
    const result = await normalizeImage(attachment, options);
    expect(result).toBe(attachment);
  });

  test('scales an oversized image to the max side and keeps the aspect ratio', async () => {
    const bytes = await makePng(3000, 1500);
    const attachment = createAttachment(
      { bytes, mimeType: 'image/png', filename: 'photo.png', role: 'avatar' },
      options.maxBytes,
    );

    const result = await normalizeImage(attachment, options);
    const metadata = await sharp(result.rawBytes).metadata();

    expect(metadata).toMatchObject({ format: 'jpeg', width: 2048, height: 1024 });
    expect(result).toMatchObject({ mimeType: 'image/jpeg', filename: 'photo.jpg', role: 'avatar' });
    expect(result.sizeBytes).toBe(result.rawBytes.byteLength);
    expect(attachment.rawBytes).toBe(bytes);
    expect(attachment.mimeType).toBe('image/png');
  });

  test('fails when the re-encoded image is still over the byte budget', async () => {
    const attachment = createAttachment({ bytes: await makePng(3000, 1500), mimeType: 'image/png' }, options.maxBytes);
    await expect(normalizeImage(attachment, { ...options, maxBytes: 100 })).rejects.toMatchObject({
      kind: 'PayloadTooLarge',
    });
  });

  test('corrects a declared type that does not match the decoded one', async () => {
    const bytes = await makeJpeg(64, 64);
    const attachment = createAttachment({ bytes, mimeType: 'image/png' }, options.maxBytes);

    const result = await normalizeImage(attachment, options);

    expect(result.mimeType).toBe('image/jpeg');
    expect(result.rawBytes).toBe(bytes);
  });

  test('rejects bytes that do not decode as an image', async () => {
    const attachment = createAttachment({ bytes: Buffer.from('not an image'), mimeType: 'image/png' }, options.maxBytes);
    await expect(normalizeImage(attachment, options)).rejects.toMatchObject({ kind: 'UnsupportedFormat' });
  });

  test('rejects a truncated image that needs resizing', async () => {
    const full = await makePng(3000, 1500);
    const truncated = full.subarray(0, Math.floor(full.byteLength / 2));
    const attachment = createAttachment(
      { bytes: truncated, mimeType: 'image/png', filename: 'broken.png' },
      options.maxBytes,
    );

    await expect(normalizeImage(attachment, options)).rejects.toMatchObject({
      kind: 'UnsupportedFormat',
      message: 'broken.png could not be decoded',
    });
  });

  test('rejects a document attachment', async () => {
    const attachment = createAttachment({ bytes: Buffer.from('%PDF'), mimeType: 'application/pdf' }, options.maxBytes);
    await expect(normalizeImage(attachment, options)).rejects.toMatchObject({ kind: 'UnsupportedFormat' });
  });
});
