import type { GeneratorConfig } from '../../lib/generator-config';
import { createAttachment } from './attachments';
import { ResumeGenerationError } from './errors';
import { normalizeImage } from './image-normalizer';
import { encodeContentBlocks } from './payload-encoder';
import { composeBriefText } from './prompt-composer';
import type { Attachment, GenerationInput, GenerationRequest } from './types';

export type RequestBuilderConfig = Pick<
  GeneratorConfig,
  'models' | 'tokens' | 'defaultTemperature' | 'limits' | 'accentColorPattern'
>;

const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

export function clampTokens(value: number, tokens: RequestBuilderConfig['tokens']): number {
  if (!Number.isFinite(value)) return tokens.defaultValue;
  return Math.min(tokens.max, Math.max(tokens.min, Math.round(value)));
}

export function clampTemperature(value: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(TEMPERATURE_RANGE.max, Math.max(TEMPERATURE_RANGE.min, value));
}

export function validateBrief(brief: string, maxLength: number): void {
  if (!brief.trim()) {
    throw new ResumeGenerationError('BriefEmpty', 'Write a brief to generate the résumé');
  }
  if (brief.length > maxLength) {
    throw new ResumeGenerationError(
      'BriefTooLong',
      `The brief is ${brief.length.toLocaleString('en-US')} characters; the limit is ${maxLength.toLocaleString('en-US')}`,
    );
  }
}

export function validateAccentColor(color: string, pattern: RegExp): void {
  if (!pattern.test(color)) {
    throw new ResumeGenerationError('InvalidColor', `Accent color "${color}" is not a #RRGGBB hex value`);
  }
}

export function validateModel(model: string, models: readonly string[]): void {
  if (!models.includes(model)) {
    throw new ResumeGenerationError(
      'UnsupportedModel',
      `Model "${model}" is not available; choose one of ${models.join(', ')}`,
    );
  }
}

async function prepareAttachments(input: GenerationInput, config: RequestBuilderConfig): Promise<Attachment[]> {
  const { maxFileBytes, maxImageSide, jpegQuality } = config.limits;
  const created = input.attachments.map((raw) => createAttachment(raw, maxFileBytes));

  const prepared: Attachment[] = [];
  for (const attachment of created) {
    prepared.push(
      attachment.kind === 'image'
        ? await normalizeImage(attachment, { maxSide: maxImageSide, quality: jpegQuality, maxBytes: maxFileBytes })
        : attachment,
    );
  }
  return prepared;
}

/**
 * Validates the inbound fields and assembles a dispatch-ready request. Every
 * validation error is raised before any attachment is decoded.
 */
export async function buildGenerationRequest(
  input: GenerationInput,
  config: RequestBuilderConfig,
): Promise<GenerationRequest> {
  validateBrief(input.briefText, config.limits.maxBriefLength);
  validateAccentColor(input.accentColor, config.accentColorPattern);
  validateModel(input.model, config.models);

  const attachments = await prepareAttachments(input, config);
  const briefText = composeBriefText(input.briefText, {
    accentColor: input.accentColor,
    includeAccentHint: input.includeAccentHint ?? true,
    roles: attachments.map((attachment) => attachment.role),
  });

  return Object.freeze({
    systemInstructions: input.systemInstructions,
    briefText,
    accentColor: input.accentColor,
    model: input.model,
    maxTokens: clampTokens(input.maxTokens, config.tokens),
    temperature: clampTemperature(input.temperature, config.defaultTemperature),
    attachments: Object.freeze(attachments),
    contentBlocks: Object.freeze(encodeContentBlocks(attachments, briefText, config.limits.maxFileBytes)),
  });
}
