import { Type } from '@sinclair/typebox';
import { MAX_PER_PAGE } from '../search-request.js';
import type { ProviderManager } from '../providers/manager.js';
import { PROVIDER_ORDER } from '../types.js';
import { jsonResult, type ToolRegistry } from './registry.js';

const IncludeAttribution = Type.Optional(Type.Boolean({
  description: 'Attach attribution text and link to results that require it. Defaults to the ENABLE_ATTRIBUTION_LINKS setting'
}));

const SearchImagesSchema = Type.Object({
  query: Type.String({ description: 'Search query (e.g., "cozy coffee shop interior")' }),
  providers: Type.Optional(Type.Array(
    Type.String({ enum: [...PROVIDER_ORDER] }),
    { description: `Providers to search. Defaults to all: ${PROVIDER_ORDER.join(', ')}` }
  )),
  per_page: Type.Optional(Type.Integer({
    default: 20,
    description: `Results per provider (1-${MAX_PER_PAGE})`
  })),
  page: Type.Optional(Type.Integer({ default: 1, description: 'Page number, starting at 1' })),
  sort_by: Type.Optional(Type.String({
    default: 'relevance',
    description: 'Sort order within each provider: "relevance" or "newest"'
  })),
  include_attribution: IncludeAttribution,
});

const ImageDetailsSchema = Type.Object({
  image_id: Type.String({ description: 'Image id from a search result, e.g. "pexels:123456" or "unsplash:abc123"' }),
  include_attribution: IncludeAttribution,
});

/**
 * Register stock image tools
 */
export function registerStockImageTools(
  server: ToolRegistry,
  getProviderManager: () => ProviderManager
): void {
  server.addTool({
    name: 'search_stock_images',
    description: 'Search royalty-free stock images on Pexels, Unsplash and Pixabay at once. Returns merged results plus a status per provider; a failing provider does not fail the search.',
    schema: SearchImagesSchema,
    handler: async (params, context) => {
      const response = await getProviderManager().search(
        {
          query: params.query,
          providers: params.providers,
          perPage: params.per_page,
          page: params.page,
          sortBy: params.sort_by,
        },
        { signal: context.signal, includeAttribution: params.include_attribution }
      );

      const allFailed = response.providers.every((entry) => entry.status === 'error');
      return jsonResult(response, allFailed);
    }
  });

  server.addTool({
    name: 'get_image_details',
    description: 'Get details of one image by the id returned from search_stock_images ("provider:nativeId").',
    schema: ImageDetailsSchema,
    handler: async (params, context) => {
      const photo = await getProviderManager().getPhoto(params.image_id, {
        signal: context.signal,
        includeAttribution: params.include_attribution,
      });
      return jsonResult(photo);
    }
  });

  server.addTool({
    name: 'stock_images_provider_status',
    description: 'Show which stock image providers have an API key configured',
    schema: Type.Object({}),
    handler: async () => jsonResult(getProviderManager().getProviderStatus())
  });
}
