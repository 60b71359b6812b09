import { ResumeGenerationError } from './errors';

/** How far from either end of the document the opening and closing markers may sit. */
export const HTML_MARKER_WINDOW = 1024;

const OPENING_MARKER = /<!doctype\s+html|<html[\s>]/i;
const CLOSING_MARKER = /<\/html\s*>/i;

export type HtmlCheck =
  | { valid: true }
  | { valid: false; reason: string };

export function checkHtmlStructure(raw: string): HtmlCheck {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { valid: false, reason: 'the response is empty' };
  }
  if (!OPENING_MARKER.test(trimmed.slice(0, HTML_MARKER_WINDOW))) {
    return { valid: false, reason: 'no <!DOCTYPE html> or <html> near the start' };
  }
  if (!CLOSING_MARKER.test(trimmed.slice(-HTML_MARKER_WINDOW))) {
    return { valid: false, reason: 'no closing </html> near the end' };
  }
  return { valid: true };
}

/** Returns `raw` untouched when it looks like a complete HTML document. */
export function validateHtmlResponse(raw: string): string {
  const check = checkHtmlStructure(raw);
  if (!check.valid) {
    throw new ResumeGenerationError('InvalidHTMLResponse', `The model response is not a complete HTML document: ${check.reason}`);
  }
  return raw;
}
