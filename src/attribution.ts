import { EImageProvider, PROVIDER_LABELS, type ImageResult } from './types.js';

const UTM_SOURCE = 'mcp-stock-images';

function attributionUrl(result: ImageResult): string {
  if (result.provider !== EImageProvider.UNSPLASH || !URL.canParse(result.pageUrl)) {
    return result.pageUrl;
  }
  // Unsplash asks for referral parameters on every link back
  const url = new URL(result.pageUrl);
  url.searchParams.set('utm_source', UTM_SOURCE);
  url.searchParams.set('utm_medium', 'referral');
  return url.toString();
}

/**
 * Returns a copy with `attribution` set when the provider requires it,
 * or the result unchanged otherwise.
 */
export function withAttribution(result: ImageResult): ImageResult {
  if (!result.attributionRequired) {
    return result;
  }
  return {
    ...result,
    attribution: {
      text: `Photo by ${result.photographer.name} on ${PROVIDER_LABELS[result.provider]}`,
      url: attributionUrl(result),
    },
  };
}
