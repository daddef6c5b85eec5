import { Type, type Static } from '@sinclair/typebox';
import type { HttpClient } from '../http.js';
import { formatImageId } from '../ids.js';
import { EImageProvider, type ImageResult, type ProviderSearchParams } from '../types.js';
import { decodeResponse, requireNumericId, type ImageProviderInterface } from './base.js';

const PexelsPhotoSchema = Type.Object({
  id: Type.Integer(),
  width: Type.Number(),
  height: Type.Number(),
  url: Type.String(),
  photographer: Type.String(),
  photographer_url: Type.Optional(Type.String()),
  alt: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  src: Type.Object({
    large: Type.String(),
    medium: Type.String(),
  }),
});

const PexelsSearchResponseSchema = Type.Object({
  photos: Type.Array(PexelsPhotoSchema),
});

type PexelsPhoto = Static<typeof PexelsPhotoSchema>;

/**
 * Pexels Provider - implementation of interface for Pexels API
 */
export class PexelsProvider implements ImageProviderInterface {
  readonly name = EImageProvider.PEXELS;
  private readonly baseUrl = 'https://api.pexels.com/v1';

  constructor(
    private readonly apiKey: string,
    private readonly http: HttpClient
  ) {}

  private get headers(): Record<string, string> {
    return { Authorization: this.apiKey };
  }

  /**
   * Normalize Pexels photo to the common format
   */
  private normalizePhoto(photo: PexelsPhoto): ImageResult {
    const alt = photo.alt?.trim();
    return {
      id: formatImageId(this.name, photo.id),
      provider: this.name,
      title: alt || `Photo by ${photo.photographer}`,
      description: alt || undefined,
      url: photo.src.large,
      thumbnailUrl: photo.src.medium,
      pageUrl: photo.url,
      width: photo.width,
      height: photo.height,
      photographer: {
        name: photo.photographer,
        profileUrl: photo.photographer_url,
      },
      license: 'Free to use under the Pexels License, attribution appreciated',
      attributionRequired: false,
      tags: [],
    };
  }

  async search(params: ProviderSearchParams, signal?: AbortSignal): Promise<ImageResult[]> {
    // Pexels search has no ordering parameter; "newest" keeps its default order
    const query = new URLSearchParams({
      query: params.query,
      per_page: String(params.perPage),
      page: String(params.page),
    });

    const data = await this.http.getJson(this.name, `${this.baseUrl}/search?${query.toString()}`, {
      headers: this.headers,
      signal,
    });

    return decodeResponse(this.name, PexelsSearchResponseSchema, data)
      .photos.map((photo) => this.normalizePhoto(photo));
  }

  async getPhoto(nativeId: string, signal?: AbortSignal): Promise<ImageResult> {
    const id = requireNumericId(this.name, nativeId);
    const data = await this.http.getJson(this.name, `${this.baseUrl}/photos/${id}`, {
      headers: this.headers,
      signal,
    });
    return this.normalizePhoto(decodeResponse(this.name, PexelsPhotoSchema, data));
  }
}
