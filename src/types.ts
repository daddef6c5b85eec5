// Provider enum
export enum EImageProvider {
  PEXELS = 'pexels',
  UNSPLASH = 'unsplash',
  PIXABAY = 'pixabay'
}

/**
 * Fixed merge order. Relevance scores are not comparable across providers,
 * so results are concatenated in this order instead of being re-ranked.
 */
export const PROVIDER_ORDER: readonly EImageProvider[] = [
  EImageProvider.PEXELS,
  EImageProvider.UNSPLASH,
  EImageProvider.PIXABAY,
];

export const PROVIDER_LABELS: Readonly<Record<EImageProvider, string>> = {
  [EImageProvider.PEXELS]: 'Pexels',
  [EImageProvider.UNSPLASH]: 'Unsplash',
  [EImageProvider.PIXABAY]: 'Pixabay',
};

export function isImageProvider(value: string): value is EImageProvider {
  return PROVIDER_ORDER.some((provider) => provider === value);
}

export type SortBy = 'relevance' | 'newest';

export type StockImageErrorKind =
  | 'MissingCredential'
  | 'ProviderHttpError'
  | 'ProviderTimeout'
  | 'MalformedResponse'
  | 'InvalidId'
  | 'InvalidParameter';

export interface Photographer {
  readonly name: string;
  readonly profileUrl?: string;
}

export interface Attribution {
  readonly text: string;
  readonly url: string;
}

// Normalized image record, built fresh for every response
export interface ImageResult {
  readonly id: string;              // Composite "provider:nativeId"
  readonly provider: EImageProvider;
  readonly title: string;
  readonly description?: string;
  readonly url: string;             // Display URL
  readonly thumbnailUrl: string;
  readonly pageUrl: string;         // Image page on the provider's site
  readonly width: number;
  readonly height: number;
  readonly photographer: Photographer;
  readonly license: string;
  readonly attributionRequired: boolean;
  readonly tags: readonly string[];
  readonly attribution?: Attribution;
}

export interface SearchRequest {
  query: string;
  providers: EImageProvider[];
  perPage: number;
  page: number;
  sortBy: SortBy;
}

/**
 * Parameters handed to a single provider adapter
 */
export type ProviderSearchParams = Omit<SearchRequest, 'providers'>;

export type ProviderStatus =
  | { provider: EImageProvider; status: 'ok'; count: number }
  | { provider: EImageProvider; status: 'error'; kind: StockImageErrorKind; reason: string };

export interface SearchResponse {
  query: string;
  page: number;
  perPage: number;
  sortBy: SortBy;
  results: ImageResult[];
  providers: ProviderStatus[];
}

/**
 * API keys - stored separately from config, never returned by a tool
 */
export interface ApiKeys {
  pexelsApiKey?: string;
  unsplashAccessKey?: string;
  pixabayApiKey?: string;
}
