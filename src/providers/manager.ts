import { withAttribution } from '../attribution.js';
import type { Config } from '../config.js';
import { StockImageError } from '../errors.js';
import { HttpClient, type FetchLike } from '../http.js';
import { parseImageId } from '../ids.js';
import { logger } from '../logger.js';
import { normalizeSearchRequest, type SearchInput } from '../search-request.js';
import {
  EImageProvider,
  PROVIDER_LABELS,
  PROVIDER_ORDER,
  type ApiKeys,
  type ImageResult,
  type ProviderSearchParams,
  type ProviderStatus,
  type SearchResponse,
} from '../types.js';
import { sanitizeErrorForResponse } from '../utils.js';
import type { ImageProviderInterface } from './base.js';
import { PexelsProvider } from './pexels.js';
import { PixabayProvider } from './pixabay.js';
import { UnsplashProvider } from './unsplash.js';

export interface ProviderManagerOptions {
  fetch?: FetchLike;
}

export interface RequestOptions {
  signal?: AbortSignal;
  /** Overrides `enableAttributionLinks` for one call */
  includeAttribution?: boolean;
}

export interface ProviderStatusReport {
  providers: Array<{ provider: EImageProvider; configured: boolean }>;
  anyConfigured: boolean;
}

const CREDENTIAL_VARS: Readonly<Record<EImageProvider, string>> = {
  [EImageProvider.PEXELS]: 'PEXELS_API_KEY',
  [EImageProvider.UNSPLASH]: 'UNSPLASH_ACCESS_KEY',
  [EImageProvider.PIXABAY]: 'PIXABAY_API_KEY',
};

function toStockImageError(provider: EImageProvider, error: unknown): StockImageError {
  if (error instanceof StockImageError) {
    return error;
  }
  return new StockImageError(
    'ProviderHttpError',
    `${PROVIDER_LABELS[provider]} failed: ${sanitizeErrorForResponse(error)}`,
    { provider, cause: error }
  );
}

/**
 * Fans searches out to the configured providers and routes detail lookups.
 * Providers without a credential are never constructed.
 */
export class ProviderManager {
  private readonly providers = new Map<EImageProvider, ImageProviderInterface>();

  constructor(
    private readonly config: Config,
    apiKeys: ApiKeys,
    options: ProviderManagerOptions = {}
  ) {
    const http = new HttpClient({
      timeoutMs: config.requestTimeoutMs,
      networkRetries: config.networkRetries,
      retryDelayMs: config.retryDelayMs,
      fetch: options.fetch,
    });

    if (apiKeys.pexelsApiKey) {
      this.providers.set(EImageProvider.PEXELS, new PexelsProvider(apiKeys.pexelsApiKey, http));
    }
    if (apiKeys.unsplashAccessKey) {
      this.providers.set(EImageProvider.UNSPLASH, new UnsplashProvider(apiKeys.unsplashAccessKey, http));
    }
    if (apiKeys.pixabayApiKey) {
      this.providers.set(EImageProvider.PIXABAY, new PixabayProvider(apiKeys.pixabayApiKey, http));
    }
  }

  private getProviderInstance(provider: EImageProvider): ImageProviderInterface {
    const instance = this.providers.get(provider);
    if (!instance) {
      throw new StockImageError(
        'MissingCredential',
        `${PROVIDER_LABELS[provider]} is not configured. Set ${CREDENTIAL_VARS[provider]} to enable it`,
        { provider }
      );
    }
    return instance;
  }

  private shouldAttribute(options: RequestOptions): boolean {
    return options.includeAttribution ?? this.config.enableAttributionLinks;
  }

  private async searchProvider(
    provider: EImageProvider,
    params: ProviderSearchParams,
    signal?: AbortSignal
  ): Promise<ImageResult[]> {
    const instance = this.getProviderInstance(provider);
    logger.debug(`[ProviderManager] Calling ${provider} search API`, { query: params.query, page: params.page });
    const photos = await instance.search(params, signal);
    logger.info(`[ProviderManager] ${provider} search completed, found ${photos.length} photos`);
    return photos;
  }

  /**
   * Query every selected provider concurrently and merge the results.
   *
   * Provider failures never reject this promise; they are reported in
   * `providers`. Invalid input rejects with InvalidParameter before any call.
   */
  async search(input: SearchInput, options: RequestOptions = {}): Promise<SearchResponse> {
    const request = normalizeSearchRequest(input);
    const params: ProviderSearchParams = {
      query: request.query,
      perPage: request.perPage,
      page: request.page,
      sortBy: request.sortBy,
    };

    const settled = await Promise.allSettled(
      request.providers.map((provider) => this.searchProvider(provider, params, options.signal))
    );

    const attribute = this.shouldAttribute(options);
    const results: ImageResult[] = [];
    const statuses: ProviderStatus[] = [];

    settled.forEach((outcome, index) => {
      const provider = request.providers[index];
      if (outcome.status === 'fulfilled') {
        results.push(...(attribute ? outcome.value.map(withAttribution) : outcome.value));
        statuses.push({ provider, status: 'ok', count: outcome.value.length });
        return;
      }

      const error = toStockImageError(provider, outcome.reason);
      logger.warn(`[ProviderManager] ${provider} search failed (${error.kind}): ${sanitizeErrorForResponse(error)}`);
      statuses.push({ provider, status: 'error', kind: error.kind, reason: error.message });
    });

    return {
      query: request.query,
      page: request.page,
      perPage: request.perPage,
      sortBy: request.sortBy,
      results,
      providers: statuses,
    };
  }

  /**
   * Resolve a composite id to its provider and fetch the photo.
   * Errors propagate to the caller.
   */
  async getPhoto(imageId: string, options: RequestOptions = {}): Promise<ImageResult> {
    const { provider, nativeId } = parseImageId(imageId);
    const instance = this.getProviderInstance(provider);

    logger.debug(`[ProviderManager] Calling ${provider}.getPhoto(${nativeId})`);
    let photo: ImageResult;
    try {
      photo = await instance.getPhoto(nativeId, options.signal);
    } catch (error) {
      throw toStockImageError(provider, error);
    }
    logger.info(`[ProviderManager] Photo received: ${photo.id}, ${photo.width}x${photo.height}`);

    return this.shouldAttribute(options) ? withAttribution(photo) : photo;
  }

  /**
   * Get provider status information
   */
  getProviderStatus(): ProviderStatusReport {
    const providers = PROVIDER_ORDER.map((provider) => ({
      provider,
      configured: this.providers.has(provider),
    }));
    return {
      providers,
      anyConfigured: providers.some((entry) => entry.configured),
    };
  }
}
