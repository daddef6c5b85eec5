import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';

/**
 * TypeBox schema for server configuration.
 * API keys are NOT included here (they are loaded separately).
 */
export const ConfigSchema = Type.Object({
  enableAttributionLinks: Type.Boolean({
    default: false,
    description: 'Attach attribution text and link to results whose provider requires attribution'
  }),
  requestTimeoutMs: Type.Integer({
    default: 10000,
    minimum: 100,
    maximum: 60000,
    description: 'Timeout for a single provider HTTP call in milliseconds'
  }),
  networkRetries: Type.Integer({
    default: 1,
    minimum: 0,
    maximum: 3,
    description: 'Retries for provider calls that failed before any HTTP response'
  }),
  retryDelayMs: Type.Integer({
    default: 250,
    minimum: 0,
    maximum: 10000,
    description: 'Delay before the first retry, doubled for each further attempt'
  })
});

export type Config = Static<typeof ConfigSchema>;
