import type { AttachmentRole } from './types';

export const AVATAR_PLACEHOLDER = 'avatar.png';
export const QR_PLACEHOLDER = 'qr.png';

export type BriefCompositionOptions = {
  accentColor: string;
  includeAccentHint: boolean;
  roles: readonly AttachmentRole[];
};

export function composeBriefText(brief: string, options: BriefCompositionOptions): string {
  const parts = [brief.trim()];

  if (options.includeAccentHint && options.accentColor) {
    parts.push(`Preferred accent color: ${options.accentColor}`);
  }
  if (options.roles.includes('avatar')) {
    parts.push(`A profile photo was provided; keep the attribute src="${AVATAR_PLACEHOLDER}" in the HTML.`);
  }
  if (options.roles.includes('qr')) {
    parts.push(`A LinkedIn QR code was provided; keep the attribute src="${QR_PLACEHOLDER}" in the HTML.`);
  }

  return parts.join('\n\n');
}
