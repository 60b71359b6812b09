import { AVATAR_PLACEHOLDER, QR_PLACEHOLDER } from './prompt-composer';

export type EmbeddedImages = {
  avatarDataUri?: string;
  qrDataUri?: string;
};

function replaceFirstSrc(html: string, placeholder: string, dataUri: string): string {
  return html
    .replace(`src="${placeholder}"`, () => `src="${dataUri}"`)
    .replace(`src='${placeholder}'`, () => `src='${dataUri}'`);
}

/**
 * Swaps the first `src="avatar.png"` / `src="qr.png"` reference (either quote
 * style) for the uploaded image.
 */
export function embedImages(html: string, images: EmbeddedImages): string {
  let updated = html;
  if (images.avatarDataUri) updated = replaceFirstSrc(updated, AVATAR_PLACEHOLDER, images.avatarDataUri);
  if (images.qrDataUri) updated = replaceFirstSrc(updated, QR_PLACEHOLDER, images.qrDataUri);
  return updated;
}
