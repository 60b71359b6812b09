import type { GeneratorConfig } from '../../lib/generator-config';
import { createLogger, type Logger } from '../../lib/logger';
import { createOpenAiTransport } from '../ai/openai-client';
import { ResumeGenerationError } from './errors';
import { validateHtmlResponse } from './html-validator';
import { embedImages, type EmbeddedImages } from './image-embedder';
import { toDataUri } from './payload-encoder';
import { buildGenerationRequest } from './request-builder';
import { ResilientClient, type GenerationTransport } from './resilient-client';
import type { GenerationInput, GenerationRequest } from './types';

export type GenerationResult =
  | { status: 'succeeded'; html: string; attempts: number; elapsedMs: number; model: string }
  | { status: 'failed'; error: ResumeGenerationError };

export type ResumeGeneratorDeps = {
  config: GeneratorConfig;
  client: ResilientClient;
  logger?: Logger;
};

function imagesToEmbed(request: GenerationRequest): EmbeddedImages {
  const avatar = request.attachments.find((attachment) => attachment.role === 'avatar' && attachment.kind === 'image');
  const qr = request.attachments.find((attachment) => attachment.role === 'qr' && attachment.kind === 'image');
  return {
    avatarDataUri: avatar ? toDataUri(avatar.mimeType, avatar.rawBytes) : undefined,
    qrDataUri: qr ? toDataUri(qr.mimeType, qr.rawBytes) : undefined,
  };
}

export class ResumeGenerator {
  private readonly config: GeneratorConfig;
  private readonly client: ResilientClient;
  private readonly logger: Logger;

  constructor(deps: ResumeGeneratorDeps) {
    this.config = deps.config;
    this.client = deps.client;
    this.logger = deps.logger ?? createLogger('ResumeGenerator');
  }

  /**
   * Builds, dispatches and validates one résumé. Classified failures come back as
   * `{ status: 'failed' }`; anything unclassified is rethrown.
   */
  async generate(input: GenerationInput, options: { signal?: AbortSignal } = {}): Promise<GenerationResult> {
    const startedAt = Date.now();
    try {
      const request = await buildGenerationRequest(input, this.config);
      this.logger.info(`Generating résumé with ${request.model}`, {
        blocks: request.contentBlocks.length,
        attachments: request.attachments.length,
        maxTokens: request.maxTokens,
        temperature: request.temperature,
      });

      const { text, attempts } = await this.client.execute(request, { signal: options.signal });
      const html = embedImages(validateHtmlResponse(text), imagesToEmbed(request));
      const elapsedMs = Date.now() - startedAt;

      this.logger.info(`Résumé ready in ${elapsedMs}ms`, { attempts, chars: html.length });
      return { status: 'succeeded', html, attempts, elapsedMs, model: request.model };
    } catch (error) {
      if (!(error instanceof ResumeGenerationError)) throw error;
      this.logger.warn(`Generation failed: ${error.kind}`, { message: error.message, attempts: error.attempts });
      return { status: 'failed', error };
    }
  }
}

export function createResumeGenerator(
  config: GeneratorConfig,
  transport: GenerationTransport = createOpenAiTransport(config.openai, { apiTimeoutMs: config.apiTimeoutMs }),
): ResumeGenerator {
  const client = new ResilientClient({
    transport,
    policy: config.retry,
    apiTimeoutMs: config.apiTimeoutMs,
  });
  return new ResumeGenerator({ config, client });
}
