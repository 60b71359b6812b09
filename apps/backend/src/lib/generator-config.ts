import path from 'path';
import { BACKEND_ROOT } from './load-env';
import {
  DEFAULT_RETRYABLE_FAILURES,
  isRemoteFailureKind,
  type RemoteFailureKind,
} from '../services/resume/errors';
import type { RetryPolicy } from '../services/resume/resilient-client';

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const HEX_COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;

export const DEFAULT_MODELS = ['gpt-4.1-mini', 'gpt-4.1', 'gpt-4o-mini', 'gpt-4o'] as const;

export const SUPPORTED_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp'] as const;
export const SUPPORTED_CONTEXT_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp', 'pdf'] as const;

export type OpenAiSettings = Readonly<{
  apiKey: string | null;
  baseURL?: string;
  organization?: string;
  project?: string;
}>;

export type TokenLimits = Readonly<{
  min: number;
  max: number;
  defaultValue: number;
  step: number;
}>;

export type PayloadLimits = Readonly<{
  maxFileBytes: number;
  maxBriefLength: number;
  maxImageSide: number;
  jpegQuality: number;
}>;

export type GeneratorConfig = Readonly<{
  openai: OpenAiSettings;
  models: readonly string[];
  defaultModel: string;
  tokens: TokenLimits;
  defaultTemperature: number;
  apiTimeoutMs: number;
  retry: RetryPolicy;
  limits: PayloadLimits;
  accentColorPattern: RegExp;
  defaultAccentColor: string;
  systemPromptPath: string;
}>;

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = String(env[key] ?? '').trim();
  return value || undefined;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  options: { integer?: boolean; min?: number; max?: number } = {},
): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  const invalid =
    !Number.isFinite(value) ||
    (options.integer && !Number.isInteger(value)) ||
    (options.min !== undefined && value < options.min) ||
    (options.max !== undefined && value > options.max);
  if (invalid) {
    throw new Error(`[Config] Invalid ${key}="${raw}"`);
  }
  return value;
}

function readList(env: Env, key: string, fallback: readonly string[]): string[] {
  const raw = readString(env, key);
  if (raw === undefined) return [...fallback];
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  if (items.length === 0) {
    throw new Error(`[Config] ${key} must list at least one value`);
  }
  return Array.from(new Set(items));
}

function readRetryableFailures(env: Env): ReadonlySet<RemoteFailureKind> {
  const kinds = readList(env, 'RETRYABLE_FAILURES', DEFAULT_RETRYABLE_FAILURES);
  const unknown = kinds.filter((kind) => !isRemoteFailureKind(kind));
  if (unknown.length > 0) {
    throw new Error(`[Config] Unknown RETRYABLE_FAILURES entries: ${unknown.join(', ')}`);
  }
  return new Set(kinds.filter(isRemoteFailureKind));
}

/**
 * Builds the immutable configuration consumed by the request builder and the
 * resilient client. Reads nothing but the given env map.
 */
export function loadGeneratorConfig(env: Env = process.env): GeneratorConfig {
  const models = readList(env, 'RESUME_MODELS', DEFAULT_MODELS);
  const defaultModel = readString(env, 'RESUME_DEFAULT_MODEL') ?? models[0];
  if (!models.includes(defaultModel)) {
    throw new Error(`[Config] RESUME_DEFAULT_MODEL "${defaultModel}" is not in RESUME_MODELS`);
  }

  const minTokens = readNumber(env, 'MIN_TOKENS', 1024, { integer: true, min: 1 });
  const maxTokens = readNumber(env, 'MAX_TOKENS', 8000, { integer: true, min: minTokens });
  const defaultTokens = readNumber(env, 'DEFAULT_MAX_TOKENS', Math.min(6000, maxTokens), {
    integer: true,
    min: minTokens,
  });
  if (maxTokens < minTokens || defaultTokens < minTokens || defaultTokens > maxTokens) {
    throw new Error(`[Config] Token bounds must satisfy MIN_TOKENS <= DEFAULT_MAX_TOKENS <= MAX_TOKENS`);
  }

  const maxRetries = readNumber(env, 'MAX_RETRIES', 3, { integer: true, min: 0 });
  const initialDelayMs = readNumber(env, 'INITIAL_RETRY_DELAY_MS', 2000, {
    integer: true,
    min: 1,
    max: MAX_TIMER_MS,
  });
  const maxDelayMs = readNumber(env, 'MAX_RETRY_DELAY_MS', 30_000, {
    integer: true,
    min: initialDelayMs,
    max: MAX_TIMER_MS,
  });
  if (maxDelayMs < initialDelayMs) {
    throw new Error('[Config] MAX_RETRY_DELAY_MS must not be below INITIAL_RETRY_DELAY_MS');
  }

  const defaultAccentColor = readString(env, 'DEFAULT_ACCENT_COLOR') ?? '#0b3a6e';
  if (!HEX_COLOR_PATTERN.test(defaultAccentColor)) {
    throw new Error(`[Config] Invalid DEFAULT_ACCENT_COLOR="${defaultAccentColor}"`);
  }

  const config: GeneratorConfig = {
    openai: Object.freeze({
      apiKey: readString(env, 'OPENAI_API_KEY') ?? null,
      baseURL: readString(env, 'OPENAI_BASE_URL'),
      organization: readString(env, 'OPENAI_ORGANIZATION'),
      project: readString(env, 'OPENAI_PROJECT'),
    }),
    models: Object.freeze(models),
    defaultModel,
    tokens: Object.freeze({
      min: minTokens,
      max: maxTokens,
      defaultValue: defaultTokens,
      step: readNumber(env, 'TOKEN_STEP', 256, { integer: true, min: 1 }),
    }),
    defaultTemperature: readNumber(env, 'DEFAULT_TEMPERATURE', 0.2, { min: 0 }),
    apiTimeoutMs: readNumber(env, 'API_TIMEOUT_MS', 120_000, { integer: true, min: 1, max: MAX_TIMER_MS }),
    retry: Object.freeze({
      maxAttempts: maxRetries + 1,
      initialDelayMs,
      backoffMultiplier: 2,
      maxDelayMs,
      retryable: readRetryableFailures(env),
    }),
    limits: Object.freeze({
      maxFileBytes: readNumber(env, 'MAX_FILE_BYTES', 8_000_000, { integer: true, min: 1 }),
      maxBriefLength: readNumber(env, 'MAX_BRIEF_LENGTH', 10_000, { integer: true, min: 1 }),
      maxImageSide: readNumber(env, 'MAX_IMAGE_SIDE', 2048, { integer: true, min: 1 }),
      jpegQuality: readNumber(env, 'JPEG_QUALITY', 85, { integer: true, min: 1 }),
    }),
    accentColorPattern: HEX_COLOR_PATTERN,
    defaultAccentColor,
    systemPromptPath: path.resolve(BACKEND_ROOT, readString(env, 'SYSTEM_PROMPT_PATH') ?? 'prompts/system-prompt.md'),
  };

  if (config.limits.jpegQuality > 100) {
    throw new Error('[Config] JPEG_QUALITY must be between 1 and 100');
  }
  if (config.defaultTemperature > 2) {
    throw new Error('[Config] DEFAULT_TEMPERATURE must be between 0 and 2');
  }

  return Object.freeze(config);
}
