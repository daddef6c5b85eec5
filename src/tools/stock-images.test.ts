import { describe, it, expect } from 'vitest';
import { ProviderManager } from '../providers/manager.js';
import { byHost, createFakeFetch, jsonResponse, textResponse } from '../testing/fake-fetch.js';
import { testConfig, unsplashPhoto } from '../testing/fixtures.js';
import { ToolRegistry, type ToolResult } from './registry.js';
import { registerStockImageTools } from './stock-images.js';

function setup() {
  const { fetch, calls } = createFakeFetch(byHost({
    'api.pexels.com': () => textResponse('Internal Server Error', 500),
    'api.unsplash.com': (url) => url.pathname === '/photos/u1'
      ? jsonResponse(unsplashPhoto('u1'))
      : jsonResponse({ results: [unsplashPhoto('u1'), unsplashPhoto('u2'), unsplashPhoto('u3')] }),
  }));
  const manager = new ProviderManager(
    testConfig,
    { pexelsApiKey: 'test-pexels-key', unsplashAccessKey: 'test-unsplash-key' },
    { fetch }
  );
  const registry = new ToolRegistry();
  registerStockImageTools(registry, () => manager);
  return { registry, calls };
}

function payload(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}

describe('stock image tools', () => {
  it('lists the tools with their JSON schemas', () => {
    const { registry } = setup();

    const listing = registry.list();

    expect(listing.map((tool) => tool.name)).toEqual([
      'search_stock_images',
      'get_image_details',
      'stock_images_provider_status',
    ]);
    expect(listing[0].inputSchema.required).toEqual(['query']);
    expect(Object.keys(listing[0].inputSchema.properties)).toEqual([
      'query',
      'providers',
      'per_page',
      'page',
      'sort_by',
      'include_attribution',
    ]);
  });

  it('returns merged results and per-provider status from search_stock_images', async () => {
    const { registry } = setup();

    const result = await registry.call('search_stock_images', {
      query: 'harbor',
      providers: ['pexels', 'unsplash'],
      per_page: 3,
    });

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({
      query: 'harbor',
      perPage: 3,
      providers: [
        { provider: 'pexels', status: 'error', kind: 'ProviderHttpError' },
        { provider: 'unsplash', status: 'ok', count: 3 },
      ],
    });
  });

  it('flags the result as an error when every provider failed', async () => {
    const { registry } = setup();

    const result = await registry.call('search_stock_images', { query: 'harbor', providers: ['pexels'] });

    expect(result.isError).toBe(true);
  });

  it('rejects an empty query as InvalidParameter without a network call', async () => {
    const { registry, calls } = setup();

    const result = await registry.call('search_stock_images', { query: '' });

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      error: { kind: 'InvalidParameter', message: 'query must not be empty' },
    });
    expect(calls).toHaveLength(0);
  });

  it('rejects per_page out of range', async () => {
    const { registry } = setup();

    const result = await registry.call('search_stock_images', { query: 'harbor', per_page: 80 });

    expect(payload(result)).toEqual({
      error: { kind: 'InvalidParameter', message: 'per_page must be an integer between 1 and 50, got 80' },
    });
  });

  it('rejects arguments of the wrong type', async () => {
    const { registry } = setup();

    const result = await registry.call('search_stock_images', { query: 42 });

    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({ error: { kind: 'InvalidParameter' } });
  });

  it('returns image details', async () => {
    const { registry } = setup();

    const result = await registry.call('get_image_details', { image_id: 'unsplash:u1' });

    expect(payload(result)).toMatchObject({ id: 'unsplash:u1', provider: 'unsplash' });
  });

  it('returns InvalidId for a malformed image id', async () => {
    const { registry } = setup();

    const result = await registry.call('get_image_details', { image_id: 'bogus' });

    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({ error: { kind: 'InvalidId' } });
  });

  it('reports provider status', async () => {
    const { registry } = setup();

    const result = await registry.call('stock_images_provider_status', {});

    expect(payload(result)).toEqual({
      providers: [
        { provider: 'pexels', configured: true },
        { provider: 'unsplash', configured: true },
        { provider: 'pixabay', configured: false },
      ],
      anyConfigured: true,
    });
  });

  it('answers unknown tools with an error result', async () => {
    const { registry } = setup();

    const result = await registry.call('delete_everything', {});

    expect(payload(result)).toEqual({ error: { message: 'Unknown tool: delete_everything' } });
  });
});
