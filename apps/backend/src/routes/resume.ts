import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import {
  SUPPORTED_CONTEXT_EXTENSIONS,
  SUPPORTED_IMAGE_EXTENSIONS,
  type GeneratorConfig,
} from '../lib/generator-config';
import { createLogger } from '../lib/logger';
import {
  ResumeGenerationError,
  describeErrorKind,
  type AttachmentRole,
  type GenerationErrorKind,
  type GenerationInput,
  type RawAttachment,
  type ResumeGenerator,
} from '../services/resume';

const logger = createLogger('Resume API');

const MAX_CONTEXT_FILES = 10;

export type UploadedFile = Pick<Express.Multer.File, 'buffer' | 'mimetype' | 'originalname'>;

export type UploadedFileMap = Partial<Record<'avatar' | 'qr' | 'context', UploadedFile[]>>;

export type ResumeRouterDeps = {
  config: GeneratorConfig;
  generator: Pick<ResumeGenerator, 'generate'>;
  systemInstructions: string;
};

const STATUS_BY_KIND: Record<GenerationErrorKind, number> = {
  BriefEmpty: 400,
  BriefTooLong: 400,
  InvalidColor: 400,
  UnsupportedModel: 400,
  UnsupportedFormat: 415,
  PayloadTooLarge: 413,
  InvalidUpload: 400,
  RateLimited: 503,
  ConnectionError: 503,
  Timeout: 504,
  ServiceUnavailable: 503,
  AuthenticationFailed: 502,
  QuotaExceeded: 502,
  MalformedRequest: 502,
  RemoteError: 502,
  RetriesExhausted: 503,
  InvalidHTMLResponse: 502,
  Cancelled: 499,
};

export function statusForErrorKind(kind: GenerationErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function toErrorBody(error: ResumeGenerationError) {
  return {
    error: error.kind,
    details: error.message,
    hint: describeErrorKind(error.kind),
    attempts: error.attempts,
    lastFailure: error.lastFailure?.kind,
  };
}

function readField(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (typeof value !== 'string') return undefined;
  return value;
}

function readNumberField(body: Record<string, unknown>, key: string, fallback: number): number {
  const raw = readField(body, key)?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function readBooleanField(body: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const raw = readField(body, key)?.trim().toLowerCase();
  if (!raw) return fallback;
  return !['false', '0', 'off', 'no'].includes(raw);
}

function toRawAttachments(files: UploadedFile[] | undefined, role: AttachmentRole): RawAttachment[] {
  return (files ?? []).map((file) => ({
    bytes: file.buffer,
    mimeType: file.mimetype,
    filename: file.originalname,
    role,
  }));
}

/**
 * Maps the multipart form onto the generator input. Context files keep their
 * upload order and come before the avatar and the QR code.
 */
export function parseGenerationForm(
  body: Record<string, unknown>,
  files: UploadedFileMap,
  config: GeneratorConfig,
  systemInstructions: string,
): GenerationInput {
  return {
    briefText: readField(body, 'brief') ?? '',
    accentColor: readField(body, 'accentColor')?.trim() || config.defaultAccentColor,
    model: readField(body, 'model')?.trim() || config.defaultModel,
    maxTokens: readNumberField(body, 'maxTokens', config.tokens.defaultValue),
    temperature: readNumberField(body, 'temperature', config.defaultTemperature),
    includeAccentHint: readBooleanField(body, 'includeAccentHint', true),
    systemInstructions,
    attachments: [
      ...toRawAttachments(files.context, 'context'),
      ...toRawAttachments(files.avatar, 'avatar'),
      ...toRawAttachments(files.qr, 'qr'),
    ],
  };
}

export function buildOptionsPayload(config: GeneratorConfig) {
  return {
    models: config.models,
    defaultModel: config.defaultModel,
    tokens: config.tokens,
    defaultTemperature: config.defaultTemperature,
    defaultAccentColor: config.defaultAccentColor,
    maxBriefLength: config.limits.maxBriefLength,
    maxFileBytes: config.limits.maxFileBytes,
    imageExtensions: SUPPORTED_IMAGE_EXTENSIONS,
    contextExtensions: SUPPORTED_CONTEXT_EXTENSIONS,
  };
}

function collectFiles(req: Request): UploadedFileMap {
  const files = req.files;
  if (!files || Array.isArray(files)) return {};
  return { avatar: files.avatar, qr: files.qr, context: files.context };
}

export function createResumeRouter(deps: ResumeRouterDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.config.limits.maxFileBytes, files: MAX_CONTEXT_FILES + 2 },
  }).fields([
    { name: 'avatar', maxCount: 1 },
    { name: 'qr', maxCount: 1 },
    { name: 'context', maxCount: MAX_CONTEXT_FILES },
  ]);

  const acceptUploads = (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        const kind = error.code === 'LIMIT_FILE_SIZE' ? 'PayloadTooLarge' : 'InvalidUpload';
        return res
          .status(statusForErrorKind(kind))
          .json({ error: kind, details: error.message, hint: describeErrorKind(kind) });
      }
      return next(error);
    });
  };

  /**
   * GET /api/resume/options
   * Model list, token bounds and upload limits for the form.
   */
  router.get('/options', (req, res) => {
    res.json(buildOptionsPayload(deps.config));
  });

  /**
   * POST /api/resume/generate
   * Multipart form; `?format=html` downloads the document instead of JSON.
   */
  router.post('/generate', acceptUploads, async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
    });

    try {
      const input = parseGenerationForm(req.body ?? {}, collectFiles(req), deps.config, deps.systemInstructions);
      const result = await deps.generator.generate(input, { signal: controller.signal });

      if (result.status === 'failed') {
        if (result.error.kind === 'Cancelled' && controller.signal.aborted) {
          logger.info('Client went away before the résumé was ready');
          return;
        }
        return res.status(statusForErrorKind(result.error.kind)).json(toErrorBody(result.error));
      }

      if (req.query.format === 'html') {
        res.attachment('resume.html');
        return res.type('html').send(result.html);
      }
      return res.json({
        html: result.html,
        attempts: result.attempts,
        elapsedMs: result.elapsedMs,
        model: result.model,
      });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
