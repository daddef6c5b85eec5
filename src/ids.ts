import { StockImageError } from './errors.js';
import { EImageProvider, isImageProvider } from './types.js';

export interface ParsedImageId {
  provider: EImageProvider;
  nativeId: string;
}

export function formatImageId(provider: EImageProvider, nativeId: string | number): string {
  return `${provider}:${nativeId}`;
}

/**
 * Split a composite id into provider and native id.
 *
 * Accepts `provider:nativeId` and the older `provider_nativeId` form.
 * Only the first separator counts, native ids may contain either character.
 */
export function parseImageId(imageId: string): ParsedImageId {
  const trimmed = imageId.trim();
  const match = /^([a-z]+)[:_](.+)$/i.exec(trimmed);
  if (!match) {
    throw new StockImageError(
      'InvalidId',
      `Invalid image id "${imageId}". Expected "provider:nativeId" (e.g. "pexels:123456")`
    );
  }

  const [, prefix, nativeId] = match;
  const provider = prefix.toLowerCase();
  if (!isImageProvider(provider)) {
    throw new StockImageError('InvalidId', `Unknown provider "${prefix}" in image id "${imageId}"`);
  }

  return { provider, nativeId };
}
