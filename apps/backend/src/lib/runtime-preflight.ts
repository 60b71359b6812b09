import fs from 'fs';
import { getProfile, type RuntimeProfile } from './load-env';
import type { GeneratorConfig } from './generator-config';

export type RuntimePreflightReport = {
  profile: RuntimeProfile;
  providers: {
    openai: boolean;
  };
  systemPrompt: boolean;
  warnings: string[];
};

function isOpenAiKeyValid(key: string | null): boolean {
  const value = String(key || '').trim();
  if (!value) return false;
  return /^sk-[A-Za-z0-9\-_]{20,}$/.test(value);
}

export function validateRuntimePreflight(config: GeneratorConfig): RuntimePreflightReport {
  const production = getProfile() === 'production';
  const openAiValid = isOpenAiKeyValid(config.openai.apiKey);
  const systemPrompt = fs.existsSync(config.systemPromptPath);

  const warnings: string[] = [];
  const errors: string[] = [];

  if (!config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is missing.');
  } else if (!openAiValid) {
    const message = 'OPENAI_API_KEY does not look like an OpenAI key.';
    if (production && !config.openai.baseURL) errors.push(message);
    else warnings.push(message);
  }

  if (!systemPrompt) {
    errors.push(`System prompt not found at ${config.systemPromptPath}.`);
  }

  if (config.retry.maxAttempts === 1) {
    warnings.push('MAX_RETRIES=0: transient failures will not be retried.');
  }

  if (errors.length > 0) {
    throw new Error(`[Preflight] Runtime validation failed:\n- ${errors.join('\n- ')}`);
  }

  return {
    profile: production ? 'production' : 'non-production',
    providers: { openai: openAiValid },
    systemPrompt,
    warnings,
  };
}
