import { Type, type Static } from '@sinclair/typebox';
import { StockImageError } from '../errors.js';
import type { HttpClient } from '../http.js';
import { formatImageId } from '../ids.js';
import { EImageProvider, type ImageResult, type ProviderSearchParams } from '../types.js';
import { decodeResponse, type ImageProviderInterface } from './base.js';

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

const UnsplashPhotoSchema = Type.Object({
  id: Type.String(),
  width: Type.Number(),
  height: Type.Number(),
  description: NullableString,
  alt_description: NullableString,
  urls: Type.Object({
    regular: Type.String(),
    small: Type.String(),
  }),
  links: Type.Object({
    html: Type.String(),
  }),
  user: Type.Object({
    name: Type.String(),
    links: Type.Optional(Type.Object({
      html: Type.Optional(Type.String()),
    })),
  }),
  tags: Type.Optional(Type.Array(Type.Object({ title: Type.String() }))),
});

const UnsplashSearchResponseSchema = Type.Object({
  results: Type.Array(UnsplashPhotoSchema),
});

type UnsplashPhoto = Static<typeof UnsplashPhotoSchema>;

const SORT_ORDER = {
  relevance: 'relevant',
  newest: 'latest',
} as const;

/**
 * Unsplash Provider - implementation of interface for Unsplash API.
 * Unsplash guidelines require crediting the photographer.
 */
export class UnsplashProvider implements ImageProviderInterface {
  readonly name = EImageProvider.UNSPLASH;
  private readonly baseUrl = 'https://api.unsplash.com';

  constructor(
    private readonly accessKey: string,
    private readonly http: HttpClient
  ) {}

  private get headers(): Record<string, string> {
    return {
      Authorization: `Client-ID ${this.accessKey}`,
      'Accept-Version': 'v1',
    };
  }

  private normalizePhoto(photo: UnsplashPhoto): ImageResult {
    const description = photo.description?.trim() || undefined;
    const altDescription = photo.alt_description?.trim() || undefined;
    return {
      id: formatImageId(this.name, photo.id),
      provider: this.name,
      title: description ?? altDescription ?? `Photo by ${photo.user.name}`,
      description: altDescription ?? description,
      url: photo.urls.regular,
      thumbnailUrl: photo.urls.small,
      pageUrl: photo.links.html,
      width: photo.width,
      height: photo.height,
      photographer: {
        name: photo.user.name,
        profileUrl: photo.user.links?.html,
      },
      license: 'Free to use under the Unsplash License',
      attributionRequired: true,
      tags: (photo.tags ?? []).map((tag) => tag.title),
    };
  }

  async search(params: ProviderSearchParams, signal?: AbortSignal): Promise<ImageResult[]> {
    const query = new URLSearchParams({
      query: params.query,
      per_page: String(params.perPage),
      page: String(params.page),
      order_by: SORT_ORDER[params.sortBy],
    });

    const data = await this.http.getJson(this.name, `${this.baseUrl}/search/photos?${query.toString()}`, {
      headers: this.headers,
      signal,
    });

    return decodeResponse(this.name, UnsplashSearchResponseSchema, data)
      .results.map((photo) => this.normalizePhoto(photo));
  }

  async getPhoto(nativeId: string, signal?: AbortSignal): Promise<ImageResult> {
    if (!/^[A-Za-z0-9_-]+$/.test(nativeId)) {
      throw new StockImageError('InvalidId', `Invalid Unsplash image id "${nativeId}"`, {
        provider: this.name,
      });
    }

    const data = await this.http.getJson(this.name, `${this.baseUrl}/photos/${nativeId}`, {
      headers: this.headers,
      signal,
    });
    return this.normalizePhoto(decodeResponse(this.name, UnsplashPhotoSchema, data));
  }
}
