import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { StockImageError } from '../errors.js';
import { PROVIDER_LABELS, type EImageProvider, type ImageResult, type ProviderSearchParams } from '../types.js';

/**
 * Base interface for image providers
 */
export interface ImageProviderInterface {
  readonly name: EImageProvider;

  /**
   * Search for images, in the provider's own order
   */
  search(params: ProviderSearchParams, signal?: AbortSignal): Promise<ImageResult[]>;

  /**
   * Get photo details by the provider's native id
   */
  getPhoto(nativeId: string, signal?: AbortSignal): Promise<ImageResult>;
}

/**
 * Check a provider payload against its schema.
 * Throws MalformedResponse naming the first mismatch.
 */
export function decodeResponse<T extends TSchema>(
  provider: EImageProvider,
  schema: T,
  data: unknown
): Static<T> {
  if (Value.Check(schema, data)) {
    return data;
  }
  const first = Value.Errors(schema, data).First();
  const where = first ? ` at ${first.path || '/'}: ${first.message}` : '';
  throw new StockImageError(
    'MalformedResponse',
    `${PROVIDER_LABELS[provider]} response has an unexpected shape${where}`,
    { provider }
  );
}

export function requireNumericId(provider: EImageProvider, nativeId: string): string {
  if (!/^\d+$/.test(nativeId)) {
    throw new StockImageError(
      'InvalidId',
      `${PROVIDER_LABELS[provider]} image ids are numeric, got "${nativeId}"`,
      { provider }
    );
  }
  return nativeId;
}
