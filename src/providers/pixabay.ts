import { Type, type Static } from '@sinclair/typebox';
import { StockImageError } from '../errors.js';
import type { HttpClient } from '../http.js';
import { formatImageId } from '../ids.js';
import { EImageProvider, type ImageResult, type ProviderSearchParams } from '../types.js';
import { decodeResponse, requireNumericId, type ImageProviderInterface } from './base.js';

const PixabayPhotoSchema = Type.Object({
  id: Type.Integer(),
  pageURL: Type.String(),
  tags: Type.String(),
  webformatURL: Type.String(),
  largeImageURL: Type.String(),
  imageWidth: Type.Number(),
  imageHeight: Type.Number(),
  user_id: Type.Number(),
  user: Type.String(),
});

const PixabaySearchResponseSchema = Type.Object({
  totalHits: Type.Optional(Type.Number()),
  hits: Type.Array(PixabayPhotoSchema),
});

type PixabayPhoto = Static<typeof PixabayPhotoSchema>;

// Pixabay API rejects per_page below 3 (official documentation)
const MIN_PER_PAGE = 3;

const SORT_ORDER = {
  relevance: 'popular',
  newest: 'latest',
} as const;

/**
 * Pixabay Provider - implementation of interface for Pixabay API
 */
export class PixabayProvider implements ImageProviderInterface {
  readonly name = EImageProvider.PIXABAY;
  private readonly baseUrl = 'https://pixabay.com/api/';

  constructor(
    private readonly apiKey: string,
    private readonly http: HttpClient
  ) {}

  private normalizePhoto(photo: PixabayPhoto): ImageResult {
    const tags = photo.tags
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);

    return {
      id: formatImageId(this.name, photo.id),
      provider: this.name,
      title: tags.length > 0 ? tags.join(', ') : `Photo by ${photo.user}`,
      url: photo.largeImageURL,
      thumbnailUrl: photo.webformatURL,
      pageUrl: photo.pageURL,
      width: photo.imageWidth,
      height: photo.imageHeight,
      photographer: {
        name: photo.user,
        profileUrl: `https://pixabay.com/users/${photo.user}-${photo.user_id}/`,
      },
      license: 'Free for commercial use under the Pixabay Content License, no attribution required',
      attributionRequired: false,
      tags,
    };
  }

  async search(params: ProviderSearchParams, signal?: AbortSignal): Promise<ImageResult[]> {
    // Pixabay pages hold at least MIN_PER_PAGE hits; fetch a page that is a
    // multiple of perPage and cut the requested window out of it
    const pageSize = params.perPage * Math.ceil(MIN_PER_PAGE / params.perPage);
    const offset = (params.page - 1) * params.perPage;
    const start = offset % pageSize;

    const query = new URLSearchParams({
      key: this.apiKey,
      q: params.query,
      per_page: String(pageSize),
      page: String(Math.floor(offset / pageSize) + 1),
      image_type: 'photo',
      order: SORT_ORDER[params.sortBy],
    });

    const data = await this.http.getJson(this.name, `${this.baseUrl}?${query.toString()}`, { signal });

    return decodeResponse(this.name, PixabaySearchResponseSchema, data)
      .hits.slice(start, start + params.perPage)
      .map((photo) => this.normalizePhoto(photo));
  }

  async getPhoto(nativeId: string, signal?: AbortSignal): Promise<ImageResult> {
    // Pixabay has no single-image endpoint; the search endpoint filters by id
    const query = new URLSearchParams({
      key: this.apiKey,
      id: requireNumericId(this.name, nativeId),
    });

    const data = await this.http.getJson(this.name, `${this.baseUrl}?${query.toString()}`, { signal });
    const [photo] = decodeResponse(this.name, PixabaySearchResponseSchema, data).hits;
    if (!photo) {
      throw new StockImageError('ProviderHttpError', `Photo with ID ${nativeId} not found in Pixabay`, {
        provider: this.name,
        status: 404,
      });
    }
    return this.normalizePhoto(photo);
  }
}
