export type AttachmentKind = 'image' | 'document';

/** Where an upload ends up in the résumé: plain context, the profile photo, or the QR code. */
export type AttachmentRole = 'context' | 'avatar' | 'qr';

export type Attachment = Readonly<{
  kind: AttachmentKind;
  rawBytes: Buffer;
  mimeType: string;
  sizeBytes: number;
  filename?: string;
  role: AttachmentRole;
}>;

export type RawAttachment = {
  bytes: Buffer;
  mimeType: string;
  filename?: string;
  role?: AttachmentRole;
};

export type TextBlock = { type: 'text'; text: string };
export type InlineImageBlock = { type: 'inline_image'; mimeType: string; dataUri: string };
export type InlineFileBlock = { type: 'inline_file'; mimeType: string; filename: string; dataUri: string };

export type ContentBlock = TextBlock | InlineImageBlock | InlineFileBlock;

export type GenerationRequest = Readonly<{
  systemInstructions: string;
  briefText: string;
  accentColor: string;
  model: string;
  maxTokens: number;
  temperature: number;
  attachments: readonly Attachment[];
  contentBlocks: readonly ContentBlock[];
}>;

/** Inbound call shape used by the HTTP layer (or any other front end). */
export type GenerationInput = {
  briefText: string;
  accentColor: string;
  model: string;
  maxTokens: number;
  temperature: number;
  attachments: RawAttachment[];
  systemInstructions: string;
  includeAccentHint?: boolean;
};
