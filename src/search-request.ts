import { invalidParameter } from './errors.js';
import { PROVIDER_ORDER, isImageProvider, type SearchRequest, type SortBy } from './types.js';

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 50;

const SORT_ALIASES = new Map<string, SortBy>([
  ['relevance', 'relevance'],
  ['relevant', 'relevance'],
  ['newest', 'newest'],
  ['latest', 'newest'],
]);

/**
 * Search input as it arrives from a caller, before defaults and checks
 */
export interface SearchInput {
  query: string;
  providers?: readonly string[];
  perPage?: number;
  page?: number;
  sortBy?: string;
}

/**
 * Apply defaults and reject invalid input. Runs before any network call.
 * Providers come back de-duplicated and in merge order.
 */
export function normalizeSearchRequest(input: SearchInput): SearchRequest {
  const query = input.query.trim();
  if (query.length === 0) {
    throw invalidParameter('query must not be empty');
  }

  const perPage = input.perPage ?? DEFAULT_PER_PAGE;
  if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
    throw invalidParameter(`per_page must be an integer between 1 and ${MAX_PER_PAGE}, got ${perPage}`);
  }

  const page = input.page ?? 1;
  if (!Number.isInteger(page) || page < 1) {
    throw invalidParameter(`page must be an integer of at least 1, got ${page}`);
  }

  const sortBy = SORT_ALIASES.get((input.sortBy ?? 'relevance').toLowerCase());
  if (!sortBy) {
    throw invalidParameter(`sort_by must be "relevance" or "newest", got "${input.sortBy}"`);
  }

  let providers = [...PROVIDER_ORDER];
  if (input.providers !== undefined) {
    const requested = input.providers.map((name) => name.trim().toLowerCase());
    if (requested.length === 0) {
      throw invalidParameter('providers must name at least one provider');
    }
    const unknown = requested.filter((name) => !isImageProvider(name));
    if (unknown.length > 0) {
      throw invalidParameter(
        `Unknown provider(s): ${unknown.join(', ')}. Available: ${PROVIDER_ORDER.join(', ')}`
      );
    }
    providers = PROVIDER_ORDER.filter((provider) => requested.includes(provider));
  }

  return { query, providers, perPage, page, sortBy };
}
