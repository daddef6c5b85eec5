import { describe, it, expect } from 'vitest';
import { HttpClient } from '../http.js';
import { createFakeFetch, jsonResponse, type RouteHandler } from '../testing/fake-fetch.js';
import { pixabayHit } from '../testing/fixtures.js';
import { PixabayProvider } from './pixabay.js';

function setup(route: RouteHandler) {
  const { fetch, calls } = createFakeFetch(route);
  const http = new HttpClient({ timeoutMs: 1000, networkRetries: 0, retryDelayMs: 0, fetch });
  return { provider: new PixabayProvider('test-pixabay-key', http), calls };
}

describe('PixabayProvider', () => {
  it('passes the key as a query parameter and maps sort order', async () => {
    const { provider, calls } = setup(() => jsonResponse({ total: 0, totalHits: 0, hits: [] }));

    await provider.search({ query: 'forest', perPage: 10, page: 2, sortBy: 'relevance' });

    expect(Object.fromEntries(calls[0].url.searchParams)).toEqual({
      key: 'test-pixabay-key',
      q: 'forest',
      per_page: '10',
      page: '2',
      image_type: 'photo',
      order: 'popular',
    });
    expect(calls[0].init?.headers).toBeUndefined();
  });

  it('asks for at least 3 hits and trims to the requested page size', async () => {
    const { provider, calls } = setup(() => jsonResponse({
      totalHits: 3,
      hits: [pixabayHit(1), pixabayHit(2), pixabayHit(3)],
    }));

    const photos = await provider.search({ query: 'forest', perPage: 1, page: 1, sortBy: 'newest' });

    expect(calls[0].url.searchParams.get('per_page')).toBe('3');
    expect(calls[0].url.searchParams.get('order')).toBe('latest');
    expect(photos.map((photo) => photo.id)).toEqual(['pixabay:1']);
  });

  describe('page sizes below the API minimum', () => {
    // Serves hits numbered from 1 across consecutive pages of the requested size
    const pagedHits: RouteHandler = (url) => {
      const size = Number(url.searchParams.get('per_page'));
      const page = Number(url.searchParams.get('page'));
      const first = (page - 1) * size + 1;
      return jsonResponse({ hits: Array.from({ length: size }, (_, i) => pixabayHit(first + i)) });
    };

    it('returns the second hit for one result per page', async () => {
      const { provider, calls } = setup(pagedHits);

      const photos = await provider.search({ query: 'forest', perPage: 1, page: 2, sortBy: 'relevance' });

      expect(calls[0].url.searchParams.get('per_page')).toBe('3');
      expect(calls[0].url.searchParams.get('page')).toBe('1');
      expect(photos.map((photo) => photo.id)).toEqual(['pixabay:2']);
    });

    it('returns the third and fourth hits for two results per page', async () => {
      const { provider, calls } = setup(pagedHits);

      const photos = await provider.search({ query: 'forest', perPage: 2, page: 2, sortBy: 'relevance' });

      expect(calls[0].url.searchParams.get('per_page')).toBe('4');
      expect(calls[0].url.searchParams.get('page')).toBe('1');
      expect(photos.map((photo) => photo.id)).toEqual(['pixabay:3', 'pixabay:4']);
    });

    it('moves to the next upstream page once the window passes it', async () => {
      const { provider, calls } = setup(pagedHits);

      const photos = await provider.search({ query: 'forest', perPage: 2, page: 3, sortBy: 'relevance' });

      expect(calls[0].url.searchParams.get('per_page')).toBe('4');
      expect(calls[0].url.searchParams.get('page')).toBe('2');
      expect(photos.map((photo) => photo.id)).toEqual(['pixabay:5', 'pixabay:6']);
    });
  });

  it('normalizes hits', async () => {
    const { provider } = setup(() => jsonResponse({ hits: [pixabayHit(195893)] }));

    const [photo] = await provider.search({ query: 'forest', perPage: 3, page: 1, sortBy: 'relevance' });

    expect(photo).toEqual({
      id: 'pixabay:195893',
      provider: 'pixabay',
      title: 'forest, trees, fog',
      url: 'https://cdn.pixabay.com/photo/195893_1280.jpg',
      thumbnailUrl: 'https://cdn.pixabay.com/photo/195893_640.jpg',
      pageUrl: 'https://pixabay.com/photos/forest-195893/',
      width: 5000,
      height: 3333,
      photographer: { name: 'CoraFrame', profileUrl: 'https://pixabay.com/users/CoraFrame-42/' },
      license: 'Free for commercial use under the Pixabay Content License, no attribution required',
      attributionRequired: false,
      tags: ['forest', 'trees', 'fog'],
    });
  });

  it('looks up a single image through the id filter', async () => {
    const { provider, calls } = setup(() => jsonResponse({ hits: [pixabayHit(55)] }));

    const photo = await provider.getPhoto('55');

    expect(Object.fromEntries(calls[0].url.searchParams)).toEqual({ key: 'test-pixabay-key', id: '55' });
    expect(photo.id).toBe('pixabay:55');
  });

  it('treats an empty id lookup as not found', async () => {
    const { provider } = setup(() => jsonResponse({ total: 0, totalHits: 0, hits: [] }));

    await expect(provider.getPhoto('99999999')).rejects.toMatchObject({
      kind: 'ProviderHttpError',
      status: 404,
      message: 'Photo with ID 99999999 not found in Pixabay',
    });
  });
});
