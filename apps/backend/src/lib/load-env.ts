import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export type RuntimeProfile = 'production' | 'non-production';

export type EnvLoadReport = {
  profile: RuntimeProfile;
  backendEnvOverride: boolean;
  apiKeyFromShell: boolean;
  loadedFiles: string[];
};

export const BACKEND_ROOT = path.resolve(__dirname, '../..');

export function getProfile(): RuntimeProfile {
  return String(process.env.NODE_ENV || '').toLowerCase() === 'production'
    ? 'production'
    : 'non-production';
}

/**
 * Repo-root .env is a fallback that never overrides the shell; the backend .env
 * overrides everything outside production.
 */
export function loadBackendEnv(backendRoot: string = BACKEND_ROOT): EnvLoadReport {
  const profile = getProfile();
  const backendEnvOverride = profile !== 'production';
  const apiKeyFromShell = Boolean(String(process.env.OPENAI_API_KEY || '').trim());

  const candidates: Array<{ file: string; override: boolean }> = [
    { file: path.resolve(backendRoot, '../../.env'), override: false },
    { file: path.resolve(backendRoot, '.env'), override: backendEnvOverride },
  ];

  const loadedFiles: string[] = [];
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate.file)) continue;
    const result = dotenv.config({ path: candidate.file, override: candidate.override });
    if (result.error) {
      throw new Error(`[Env] Failed to parse ${candidate.file}: ${result.error.message}`);
    }
    loadedFiles.push(candidate.file);
  }

  return { profile, backendEnvOverride, apiKeyFromShell, loadedFiles };
}
