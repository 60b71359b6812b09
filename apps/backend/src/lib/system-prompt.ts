import fs from 'fs/promises';
import { createLogger } from './logger';

const logger = createLogger('SystemPrompt');

/**
 * Reads the generation instructions once at start-up. The content is opaque to
 * the generator; an empty file is treated as missing.
 */
export async function loadSystemPrompt(promptPath: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(promptPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`[SystemPrompt] Cannot read ${promptPath}: ${reason}`, { cause: error });
  }
  if (!content.trim()) {
    throw new Error(`[SystemPrompt] ${promptPath} is empty`);
  }
  logger.debug(`Loaded ${content.length.toLocaleString('en-US')} characters from ${promptPath}`);
  return content;
}
