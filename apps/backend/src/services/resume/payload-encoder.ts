import { formatBytes } from './attachments';
import { ResumeGenerationError } from './errors';
import type { Attachment, ContentBlock } from './types';

export function toDataUri(mimeType: string, bytes: Buffer): string {
  return `data:${mimeType};base64,${bytes.toString('base64')}`;
}

function defaultFilename(attachment: Attachment, index: number): string {
  const ext = attachment.mimeType === 'application/pdf' ? 'pdf' : 'bin';
  return `attachment-${index + 1}.${ext}`;
}

function encodeAttachment(attachment: Attachment, index: number): ContentBlock {
  switch (attachment.kind) {
    case 'image':
      return {
        type: 'inline_image',
        mimeType: attachment.mimeType,
        dataUri: toDataUri(attachment.mimeType, attachment.rawBytes),
      };
    case 'document':
      if (attachment.mimeType !== 'application/pdf') {
        throw new ResumeGenerationError('UnsupportedFormat', `Unsupported document type "${attachment.mimeType}"`);
      }
      return {
        type: 'inline_file',
        mimeType: attachment.mimeType,
        filename: attachment.filename ?? defaultFilename(attachment, index),
        dataUri: toDataUri(attachment.mimeType, attachment.rawBytes),
      };
  }
}

/**
 * Attachments first, in upload order, then the brief as the closing text block.
 * Every size is checked before anything is encoded.
 */
export function encodeContentBlocks(
  attachments: readonly Attachment[],
  briefText: string,
  maxFileBytes: number,
): ContentBlock[] {
  attachments.forEach((attachment, index) => {
    if (attachment.sizeBytes > maxFileBytes) {
      throw new ResumeGenerationError(
        'PayloadTooLarge',
        `${attachment.filename ?? `Attachment ${index + 1}`} is ${formatBytes(attachment.sizeBytes)}; the limit is ${formatBytes(maxFileBytes)}`,
      );
    }
  });

  const blocks = attachments.map(encodeAttachment);
  blocks.push({ type: 'text', text: briefText });
  return blocks;
}
