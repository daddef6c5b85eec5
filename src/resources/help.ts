import { MAX_PER_PAGE, DEFAULT_PER_PAGE } from '../search-request.js';

export const HELP_URI = 'stock-images://help';

export const HELP_TEXT = `# Stock Images MCP Server

Search royalty-free stock photos on Pexels, Unsplash and Pixabay with one query.

## Tools

### search_stock_images
- \`query\` (required): search terms
- \`providers\`: any of \`pexels\`, \`unsplash\`, \`pixabay\` (default: all)
- \`per_page\`: results per provider, 1-${MAX_PER_PAGE} (default ${DEFAULT_PER_PAGE})
- \`page\`: page number (default 1)
- \`sort_by\`: \`relevance\` or \`newest\` (Pexels ignores \`newest\`)
- \`include_attribution\`: attach credit text and link where the provider requires it

Results keep each provider's own order; providers follow in the order
pexels, unsplash, pixabay. Every requested provider gets a status entry,
so a provider that failed shows up with its error instead of failing the search.

### get_image_details
- \`image_id\` (required): the \`id\` of a search result, e.g. \`pexels:123456\`

### stock_images_provider_status
Lists the providers that have an API key configured.

## Setup

| Provider | Environment variable | Get a key |
|---|---|---|
| Pexels | \`PEXELS_API_KEY\` | https://www.pexels.com/api/ |
| Unsplash | \`UNSPLASH_ACCESS_KEY\` | https://unsplash.com/developers |
| Pixabay | \`PIXABAY_API_KEY\` | https://pixabay.com/api/docs/ |

Set \`ENABLE_ATTRIBUTION_LINKS=true\` to include attribution in results by default.

## Licenses

- Pexels: free to use, attribution appreciated
- Unsplash: free under the Unsplash License, credit the photographer
- Pixabay: free under the Pixabay Content License, no attribution required
`;
