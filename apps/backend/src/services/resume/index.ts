export * from './types';
export * from './errors';
export { createAttachment, guessMimeType, normalizeMimeType } from './attachments';
export { normalizeImage, type ImageNormalizerOptions } from './image-normalizer';
export { encodeContentBlocks, toDataUri } from './payload-encoder';
export { composeBriefText } from './prompt-composer';
export { buildGenerationRequest, clampTokens, clampTemperature } from './request-builder';
export {
  ResilientClient,
  type ClientState,
  type DispatchOutcome,
  type GenerationTransport,
  type RetryEvent,
  type RetryPolicy,
} from './resilient-client';
export { validateHtmlResponse, checkHtmlStructure } from './html-validator';
export { embedImages } from './image-embedder';
export { ResumeGenerator, createResumeGenerator, type GenerationResult } from './resume-generator';
